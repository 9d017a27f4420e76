import { FrameReader, FrameWriter } from './FrameBuffer';

// QColor::Spec values used on the wire
export enum ColorSpec {
    INVALID = 0,
    RGB = 1,
    HSV = 2,
    CMYK = 3,
    HSL = 4,
    EXTENDED_RGB = 5,
}

// QColor as streamed by QDataStream: 16-bit channels. The spec byte is kept
// as received, so any ColorSpec (or an unknown one) re-encodes unchanged.
export interface QColor {
    spec: number;
    alpha: number;
    red: number;
    green: number;
    blue: number;
}

const CHANNEL_MAX = 0xffff;

// Sending an invalid color clears a highlight
export const INVALID_COLOR: QColor = {
    spec: ColorSpec.INVALID,
    alpha: CHANNEL_MAX,
    red: 0,
    green: 0,
    blue: 0,
};

// Scale 8-bit channels to Qt's 16-bit representation (0xff -> 0xffff)
export function rgbColor(red: number, green: number, blue: number, alpha: number = 255): QColor {
    return {
        spec: ColorSpec.RGB,
        alpha: alpha * 257,
        red: red * 257,
        green: green * 257,
        blue: blue * 257,
    };
}

export function parseHexColor(hex: string): QColor {
    const match = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(hex.trim());
    if (!match) {
        throw new Error(`Invalid color: ${hex}`);
    }
    return rgbColor(parseInt(match[1], 16), parseInt(match[2], 16), parseInt(match[3], 16));
}

export function readColor(reader: FrameReader): QColor {
    const spec = reader.readU8();
    const alpha = reader.readU16();
    const red = reader.readU16();
    const green = reader.readU16();
    const blue = reader.readU16();
    reader.readU16(); // padding
    return { spec, alpha, red, green, blue };
}

export function writeColor(writer: FrameWriter, color: QColor): void {
    writer.writeU8(color.spec);
    writer.writeU16(color.alpha);
    writer.writeU16(color.red);
    writer.writeU16(color.green);
    writer.writeU16(color.blue);
    writer.writeU16(0);
}

// Qt::TimeSpec
export enum TimeSpec {
    LOCAL = 0,
    UTC = 1,
    OFFSET_FROM_UTC = 2,
    TIME_ZONE = 3,
}

export interface QDateTime {
    julianDay: number;
    msecsSinceMidnight: number;
    timeSpec: number;       // TimeSpec, kept as received
    // Seconds east of UTC, only streamed for OFFSET_FROM_UTC
    offsetSeconds?: number;
}

export function readDateTime(reader: FrameReader): QDateTime {
    const julianDay = Number(reader.readI64());
    const msecsSinceMidnight = reader.readU32();
    const timeSpec = reader.readU8();
    if (timeSpec === TimeSpec.OFFSET_FROM_UTC) {
        return { julianDay, msecsSinceMidnight, timeSpec, offsetSeconds: reader.readI32() };
    }
    return { julianDay, msecsSinceMidnight, timeSpec };
}

export function writeDateTime(writer: FrameWriter, value: QDateTime): void {
    writer.writeI64(value.julianDay);
    writer.writeU32(value.msecsSinceMidnight);
    writer.writeU8(value.timeSpec);
    if (value.timeSpec === TimeSpec.OFFSET_FROM_UTC) {
        writer.writeI32(value.offsetSeconds ?? 0);
    }
}
