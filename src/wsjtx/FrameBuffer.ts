import { DecodeStage, InvalidLengthError, TelegramEncodeError, TruncatedBufferError } from './errors';

// Qt QDataStream encodes a null QByteArray/QString with this length
const NULL_STRING_LENGTH = -1;

/**
 * Cursor over a received datagram. All multi-byte values are big-endian
 * (QDataStream default byte order).
 */
export class FrameReader {
    // Reported in errors so callers can tell header problems from field problems
    public stage: DecodeStage = 'field';

    private buffer: Buffer;
    private position: number = 0;
    private tailEnded: boolean = false;

    constructor(buffer: Buffer) {
        this.buffer = buffer;
    }

    public get offset(): number {
        return this.position;
    }

    public get remaining(): number {
        return this.buffer.length - this.position;
    }

    private need(bytes: number): void {
        if (this.remaining < bytes) {
            throw new TruncatedBufferError(bytes, this.remaining, this.stage, this.position);
        }
    }

    public readU8(): number {
        this.need(1);
        const value = this.buffer.readUInt8(this.position);
        this.position += 1;
        return value;
    }

    public readU16(): number {
        this.need(2);
        const value = this.buffer.readUInt16BE(this.position);
        this.position += 2;
        return value;
    }

    public readU32(): number {
        this.need(4);
        const value = this.buffer.readUInt32BE(this.position);
        this.position += 4;
        return value;
    }

    public readU64(): bigint {
        this.need(8);
        const value = this.buffer.readBigUInt64BE(this.position);
        this.position += 8;
        return value;
    }

    public readI32(): number {
        this.need(4);
        const value = this.buffer.readInt32BE(this.position);
        this.position += 4;
        return value;
    }

    public readI64(): bigint {
        this.need(8);
        const value = this.buffer.readBigInt64BE(this.position);
        this.position += 8;
        return value;
    }

    public readF64(): number {
        this.need(8);
        const value = this.buffer.readDoubleBE(this.position);
        this.position += 8;
        return value;
    }

    public readBool(): boolean {
        return this.readU8() !== 0;
    }

    /**
     * Length-prefixed UTF-8 string. A length of -1 is Qt's null string and
     * decodes to null; a length of 0 is the empty string.
     */
    public readString(): string | null {
        const start = this.position;
        const length = this.readI32();
        if (length === NULL_STRING_LENGTH) {
            return null;
        }
        if (length < 0 || length > this.remaining) {
            throw new InvalidLengthError(length, this.remaining, this.stage, start);
        }
        const value = this.buffer.toString('utf8', this.position, this.position + length);
        this.position += length;
        return value;
    }

    // Flag byte followed by the value when the flag is set
    public readOptional<T>(inner: (reader: FrameReader) => T): T | undefined {
        return this.readBool() ? inner(this) : undefined;
    }

    /**
     * Reads a field that newer senders append to a telegram. Older senders stop
     * early, so an exhausted buffer (or a field cut short) ends the tail: this
     * and every later tail read return undefined.
     */
    public readTail<T>(inner: (reader: FrameReader) => T): T | undefined {
        if (this.tailEnded || this.remaining === 0) {
            this.tailEnded = true;
            return undefined;
        }

        try {
            return inner(this);
        } catch (error) {
            const cutShort = error instanceof TruncatedBufferError ||
                (error instanceof InvalidLengthError && error.length > error.available);
            if (!cutShort) {
                throw error;
            }
            this.tailEnded = true;
            this.position = this.buffer.length;
            return undefined;
        }
    }
}

/**
 * Append-only builder for an outgoing datagram; mirrors FrameReader.
 */
export class FrameWriter {
    private chunks: Buffer[] = [];
    private length: number = 0;
    private tailEnded: boolean = false;
    private includeTail: boolean;

    /**
     * @param includeTail - false drops every writeTail() field (targets that
     *   predate the optional fields)
     */
    constructor(includeTail: boolean = true) {
        this.includeTail = includeTail;
    }

    public get offset(): number {
        return this.length;
    }

    private push(chunk: Buffer): void {
        this.chunks.push(chunk);
        this.length += chunk.length;
    }

    public writeU8(value: number): void {
        const chunk = Buffer.alloc(1);
        chunk.writeUInt8(value, 0);
        this.push(chunk);
    }

    public writeU16(value: number): void {
        const chunk = Buffer.alloc(2);
        chunk.writeUInt16BE(value, 0);
        this.push(chunk);
    }

    public writeU32(value: number): void {
        const chunk = Buffer.alloc(4);
        chunk.writeUInt32BE(value, 0);
        this.push(chunk);
    }

    public writeU64(value: bigint | number): void {
        const chunk = Buffer.alloc(8);
        chunk.writeBigUInt64BE(BigInt(value), 0);
        this.push(chunk);
    }

    public writeI32(value: number): void {
        const chunk = Buffer.alloc(4);
        chunk.writeInt32BE(value, 0);
        this.push(chunk);
    }

    public writeI64(value: bigint | number): void {
        const chunk = Buffer.alloc(8);
        chunk.writeBigInt64BE(BigInt(value), 0);
        this.push(chunk);
    }

    public writeF64(value: number): void {
        const chunk = Buffer.alloc(8);
        chunk.writeDoubleBE(value, 0);
        this.push(chunk);
    }

    public writeBool(value: boolean): void {
        this.writeU8(value ? 1 : 0);
    }

    public writeString(value: string | null): void {
        if (value === null) {
            this.writeI32(NULL_STRING_LENGTH);
            return;
        }
        const bytes = Buffer.from(value, 'utf8');
        this.writeI32(bytes.length);
        this.push(bytes);
    }

    public writeOptional<T>(value: T | undefined, inner: (writer: FrameWriter, value: T) => void): void {
        this.writeBool(value !== undefined);
        if (value !== undefined) {
            inner(this, value);
        }
    }

    /**
     * Counterpart of FrameReader.readTail(). An absent value ends the tail; a
     * present value after that has no wire representation.
     */
    public writeTail<T>(value: T | undefined, inner: (writer: FrameWriter, value: T) => void): void {
        if (!this.includeTail) {
            return;
        }
        if (value === undefined) {
            this.tailEnded = true;
            return;
        }
        if (this.tailEnded) {
            throw new TelegramEncodeError('Optional field present after an absent one');
        }
        inner(this, value);
    }

    public toBuffer(): Buffer {
        return Buffer.concat(this.chunks, this.length);
    }
}
