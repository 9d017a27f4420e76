import { describe, expect, it } from 'vitest';
import { FrameReader, FrameWriter } from '../wsjtx/FrameBuffer';
import { InvalidLengthError, TelegramEncodeError, TruncatedBufferError } from '../wsjtx/errors';

describe('FrameWriter', () => {
    it('writes integers big-endian', () => {
        const writer = new FrameWriter();
        writer.writeU8(0x01);
        writer.writeU16(0x0203);
        writer.writeU32(0x04050607);
        writer.writeI32(-2);

        expect(writer.toBuffer()).toEqual(Buffer.from([
            0x01,
            0x02, 0x03,
            0x04, 0x05, 0x06, 0x07,
            0xff, 0xff, 0xff, 0xfe,
        ]));
        expect(writer.offset).toBe(11);
    });

    it('writes strings as UTF-8 with a byte length prefix', () => {
        const writer = new FrameWriter();
        writer.writeString('Ä1');
        expect(writer.toBuffer()).toEqual(Buffer.from([0, 0, 0, 3, 0xc3, 0x84, 0x31]));
    });

    it('writes null and empty strings differently', () => {
        const writer = new FrameWriter();
        writer.writeString(null);
        writer.writeString('');
        expect(writer.toBuffer()).toEqual(Buffer.from([0xff, 0xff, 0xff, 0xff, 0, 0, 0, 0]));
    });

    it('writes a flag byte before optional values', () => {
        const writer = new FrameWriter();
        writer.writeOptional<number>(7, (w, v) => w.writeU8(v));
        writer.writeOptional<number>(undefined, (w, v) => w.writeU8(v));
        expect(writer.toBuffer()).toEqual(Buffer.from([1, 7, 0]));
    });

    it('stops the tail at the first absent field', () => {
        const writer = new FrameWriter();
        writer.writeTail<number>(5, (w, v) => w.writeU8(v));
        writer.writeTail<number>(undefined, (w, v) => w.writeU8(v));
        writer.writeTail<number>(undefined, (w, v) => w.writeU8(v));
        expect(writer.toBuffer()).toEqual(Buffer.from([5]));
    });

    it('rejects a tail field after an absent one', () => {
        const writer = new FrameWriter();
        writer.writeTail<number>(undefined, (w, v) => w.writeU8(v));
        expect(() => writer.writeTail<number>(1, (w, v) => w.writeU8(v))).toThrow(TelegramEncodeError);
    });

    it('drops tail fields when the target has none', () => {
        const writer = new FrameWriter(false);
        writer.writeU8(9);
        writer.writeTail<number>(5, (w, v) => w.writeU8(v));
        expect(writer.toBuffer()).toEqual(Buffer.from([9]));
    });
});

describe('FrameReader', () => {
    it('reads what the writer wrote', () => {
        const writer = new FrameWriter();
        writer.writeU8(200);
        writer.writeU16(65000);
        writer.writeU32(4_000_000_000);
        writer.writeU64(14_074_000n);
        writer.writeI32(-15);
        writer.writeI64(-3n);
        writer.writeF64(0.25);
        writer.writeBool(true);
        writer.writeString('CQ K1ABC FN42');

        const reader = new FrameReader(writer.toBuffer());
        expect(reader.readU8()).toBe(200);
        expect(reader.readU16()).toBe(65000);
        expect(reader.readU32()).toBe(4_000_000_000);
        expect(reader.readU64()).toBe(14_074_000n);
        expect(reader.readI32()).toBe(-15);
        expect(reader.readI64()).toBe(-3n);
        expect(reader.readF64()).toBe(0.25);
        expect(reader.readBool()).toBe(true);
        expect(reader.readString()).toBe('CQ K1ABC FN42');
        expect(reader.remaining).toBe(0);
    });

    it('reads a -1 length as a null string', () => {
        const reader = new FrameReader(Buffer.from([0xff, 0xff, 0xff, 0xff, 0, 0, 0, 0]));
        expect(reader.readString()).toBeNull();
        expect(reader.readString()).toBe('');
    });

    it('treats any non-zero byte as true', () => {
        const reader = new FrameReader(Buffer.from([0, 2]));
        expect(reader.readBool()).toBe(false);
        expect(reader.readBool()).toBe(true);
    });

    it('reports truncation with stage and offset', () => {
        const reader = new FrameReader(Buffer.from([1, 2, 3]));
        reader.readU8();
        reader.stage = 'header';

        let caught: unknown;
        try {
            reader.readU32();
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(TruncatedBufferError);
        expect(caught).toMatchObject({ needed: 4, available: 2, stage: 'header', offset: 1 });
    });

    it('rejects string lengths past the end of the buffer', () => {
        const reader = new FrameReader(Buffer.from([0, 0, 0, 10, 0x41]));
        expect(() => reader.readString()).toThrow(InvalidLengthError);
    });

    it('rejects negative string lengths other than -1', () => {
        const reader = new FrameReader(Buffer.from([0xff, 0xff, 0xff, 0xfe]));

        let caught: unknown;
        try {
            reader.readString();
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(InvalidLengthError);
        expect(caught).toMatchObject({ length: -2, offset: 0 });
    });

    it('reads optional values behind their flag byte', () => {
        const reader = new FrameReader(Buffer.from([1, 7, 0]));
        const u8 = (r: FrameReader): number => r.readU8();
        expect(reader.readOptional(u8)).toBe(7);
        expect(reader.readOptional(u8)).toBeUndefined();
    });

    it('returns undefined for tail fields past the end', () => {
        const reader = new FrameReader(Buffer.from([5]));
        const u8 = (r: FrameReader): number => r.readU8();
        expect(reader.readTail(u8)).toBe(5);
        expect(reader.readTail(u8)).toBeUndefined();
    });

    it('ends the tail at a field cut short', () => {
        // u32 with only two bytes, then nothing
        const reader = new FrameReader(Buffer.from([0, 1]));
        const u32 = (r: FrameReader): number => r.readU32();
        const u8 = (r: FrameReader): number => r.readU8();
        expect(reader.readTail(u32)).toBeUndefined();
        expect(reader.readTail(u8)).toBeUndefined();
        expect(reader.remaining).toBe(0);
    });

    it('ends the tail at a string cut short', () => {
        const reader = new FrameReader(Buffer.from([0, 0, 0, 5, 0x41, 0x42]));
        const str = (r: FrameReader): string | null => r.readString();
        expect(reader.readTail(str)).toBeUndefined();
    });

    it('still rejects corrupt lengths inside the tail', () => {
        const reader = new FrameReader(Buffer.from([0xff, 0xff, 0xff, 0xf0, 0x41]));
        const str = (r: FrameReader): string | null => r.readString();
        expect(() => reader.readTail(str)).toThrow(InvalidLengthError);
    });
});
