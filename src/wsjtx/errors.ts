// Decode stage an error was raised in
export type DecodeStage = 'header' | 'type' | 'field';

/**
 * Base class of every failure while turning a datagram into a telegram.
 * Carries the stage and the byte offset at which reading failed.
 */
export class TelegramDecodeError extends Error {
    public readonly stage: DecodeStage;
    public readonly offset: number;

    constructor(message: string, stage: DecodeStage, offset: number) {
        super(`${message} (stage=${stage}, offset=${offset})`);
        this.name = 'TelegramDecodeError';
        this.stage = stage;
        this.offset = offset;
    }
}

export class BadMagicError extends TelegramDecodeError {
    public readonly actual: number;

    constructor(actual: number) {
        super(`Bad magic number 0x${actual.toString(16).padStart(8, '0')}`, 'header', 0);
        this.name = 'BadMagicError';
        this.actual = actual;
    }
}

export class UnknownTypeError extends TelegramDecodeError {
    public readonly typeCode: number;

    constructor(typeCode: number, offset: number) {
        super(`Unknown telegram type ${typeCode}`, 'type', offset);
        this.name = 'UnknownTypeError';
        this.typeCode = typeCode;
    }
}

export class TruncatedBufferError extends TelegramDecodeError {
    public readonly needed: number;
    public readonly available: number;

    constructor(needed: number, available: number, stage: DecodeStage, offset: number) {
        super(`Buffer truncated: need ${needed} bytes, ${available} left`, stage, offset);
        this.name = 'TruncatedBufferError';
        this.needed = needed;
        this.available = available;
    }
}

export class InvalidLengthError extends TelegramDecodeError {
    public readonly length: number;
    public readonly available: number;

    constructor(length: number, available: number, stage: DecodeStage, offset: number) {
        super(`Invalid string length ${length} with ${available} bytes left`, stage, offset);
        this.name = 'InvalidLengthError';
        this.length = length;
        this.available = available;
    }
}

export class TelegramEncodeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'TelegramEncodeError';
    }
}

// Raised by (or on behalf of) a contact lookup that cannot answer
export class LookupUnavailableError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'LookupUnavailableError';
    }
}
