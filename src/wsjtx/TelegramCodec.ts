import { FrameReader, FrameWriter } from './FrameBuffer';
import { BadMagicError, InvalidLengthError, TelegramEncodeError, UnknownTypeError } from './errors';
import { readColor, readDateTime, writeColor, writeDateTime, QColor, QDateTime } from './qtypes';
import {
    MAGIC,
    OPTIONAL_FIELDS_SCHEMA_VERSION,
    Telegram,
    TelegramHeader,
    TelegramType,
} from './types';

// Maximum quint32 value - "not set" / "no change" for some numeric fields
const UNSET_U32 = 0xffffffff;

// Field readers, passed to readTail()
const u8 = (r: FrameReader): number => r.readU8();
const u32 = (r: FrameReader): number => r.readU32();
const bool = (r: FrameReader): boolean => r.readBool();
const str = (r: FrameReader): string | null => r.readString();
const u64 = (r: FrameReader): number => Number(r.readU64());
const unsetU32 = (r: FrameReader): number | null => {
    const value = r.readU32();
    return value === UNSET_U32 ? null : value;
};

// Field writers, passed to writeTail()
const putU8 = (w: FrameWriter, v: number): void => w.writeU8(v);
const putU32 = (w: FrameWriter, v: number): void => w.writeU32(v);
const putBool = (w: FrameWriter, v: boolean): void => w.writeBool(v);
const putStr = (w: FrameWriter, v: string | null): void => w.writeString(v);
const putUnsetU32 = (w: FrameWriter, v: number | null): void => w.writeU32(v ?? UNSET_U32);
const putDateTime = (w: FrameWriter, v: QDateTime): void => writeDateTime(w, v);
const putColor = (w: FrameWriter, v: QColor): void => writeColor(w, v);

export function telegramTypeName(type: number): string {
    const name: string | undefined = TelegramType[type];
    return name ?? `UNKNOWN(${type})`;
}

function checkMagic(bytes: Buffer): void {
    const expected = Buffer.alloc(4);
    expected.writeUInt32BE(MAGIC, 0);

    // A short datagram is still rejected as soon as its bytes disagree
    const prefix = bytes.subarray(0, 4);
    if (!prefix.equals(expected.subarray(0, prefix.length))) {
        const actual = prefix.length > 0 ? prefix.readUIntBE(0, prefix.length) : 0;
        throw new BadMagicError(actual);
    }
}

/**
 * Decode one datagram. Layout: magic, schema version, type code, id, then the
 * type's fields. Trailing fields an older sender leaves out decode as undefined.
 */
export function decodeTelegram(bytes: Buffer): Telegram {
    checkMagic(bytes);

    const reader = new FrameReader(bytes);
    reader.stage = 'header';
    reader.readU32(); // magic
    const schemaVersion = reader.readU32();
    const typeOffset = reader.offset;
    const typeCode = reader.readU32();
    const idOffset = reader.offset;
    const id = reader.readString();
    if (id === null) {
        throw new InvalidLengthError(-1, reader.remaining, 'header', idOffset);
    }

    reader.stage = 'type';
    const header: TelegramHeader = { schemaVersion, id };
    const telegram = readBody(typeCode, reader, header);
    if (!telegram) {
        throw new UnknownTypeError(typeCode, typeOffset);
    }
    return telegram;
}

function readBody(typeCode: number, reader: FrameReader, header: TelegramHeader): Telegram | null {
    switch (typeCode) {
        case TelegramType.HEARTBEAT:
            reader.stage = 'field';
            return {
                ...header,
                type: TelegramType.HEARTBEAT,
                maxSchemaVersion: reader.readU32(),
                version: reader.readString(),
                revision: reader.readTail(str),
            };

        case TelegramType.STATUS:
            reader.stage = 'field';
            return {
                ...header,
                type: TelegramType.STATUS,
                dialFrequency: u64(reader),
                mode: reader.readString(),
                dxCall: reader.readString(),
                report: reader.readString(),
                txMode: reader.readString(),
                txEnabled: reader.readBool(),
                transmitting: reader.readBool(),
                decoding: reader.readBool(),
                rxDF: reader.readTail(u32),
                txDF: reader.readTail(u32),
                deCall: reader.readTail(str),
                deGrid: reader.readTail(str),
                dxGrid: reader.readTail(str),
                txWatchdog: reader.readTail(bool),
                subMode: reader.readTail(str),
                fastMode: reader.readTail(bool),
                specialOpMode: reader.readTail(u8),
                frequencyTolerance: reader.readTail(unsetU32),
                trPeriod: reader.readTail(unsetU32),
                configurationName: reader.readTail(str),
                txMessage: reader.readTail(str),
            };

        case TelegramType.DECODE:
            reader.stage = 'field';
            return {
                ...header,
                type: TelegramType.DECODE,
                newDecode: reader.readBool(),
                time: reader.readU32(),
                snr: reader.readI32(),
                deltaTime: reader.readF64(),
                deltaFrequency: reader.readU32(),
                mode: reader.readString(),
                message: reader.readString(),
                lowConfidence: reader.readTail(bool),
                offAir: reader.readTail(bool),
            };

        case TelegramType.CLEAR:
            reader.stage = 'field';
            return {
                ...header,
                type: TelegramType.CLEAR,
                window: reader.readTail(u8),
            };

        case TelegramType.REPLY:
            reader.stage = 'field';
            return {
                ...header,
                type: TelegramType.REPLY,
                time: reader.readU32(),
                snr: reader.readI32(),
                deltaTime: reader.readF64(),
                deltaFrequency: reader.readU32(),
                mode: reader.readString(),
                message: reader.readString(),
                lowConfidence: reader.readBool(),
                modifiers: reader.readTail(u8),
            };

        case TelegramType.QSO_LOGGED:
            reader.stage = 'field';
            return {
                ...header,
                type: TelegramType.QSO_LOGGED,
                timeOff: readDateTime(reader),
                dxCall: reader.readString(),
                dxGrid: reader.readString(),
                txFrequency: u64(reader),
                mode: reader.readString(),
                reportSent: reader.readString(),
                reportReceived: reader.readString(),
                txPower: reader.readString(),
                comments: reader.readString(),
                name: reader.readString(),
                timeOn: reader.readTail(readDateTime),
                operatorCall: reader.readTail(str),
                myCall: reader.readTail(str),
                myGrid: reader.readTail(str),
                exchangeSent: reader.readTail(str),
                exchangeReceived: reader.readTail(str),
                adifPropagationMode: reader.readTail(str),
            };

        case TelegramType.CLOSE:
            return { ...header, type: TelegramType.CLOSE };

        case TelegramType.REPLAY:
            return { ...header, type: TelegramType.REPLAY };

        case TelegramType.HALT_TX:
            reader.stage = 'field';
            return {
                ...header,
                type: TelegramType.HALT_TX,
                autoTxOnly: reader.readBool(),
            };

        case TelegramType.FREE_TEXT:
            reader.stage = 'field';
            return {
                ...header,
                type: TelegramType.FREE_TEXT,
                text: reader.readString(),
                send: reader.readTail(bool),
            };

        case TelegramType.WSPR_DECODE:
            reader.stage = 'field';
            return {
                ...header,
                type: TelegramType.WSPR_DECODE,
                newDecode: reader.readBool(),
                time: reader.readU32(),
                snr: reader.readI32(),
                deltaTime: reader.readF64(),
                frequency: u64(reader),
                drift: reader.readI32(),
                callsign: reader.readString(),
                grid: reader.readString(),
                power: reader.readI32(),
                offAir: reader.readTail(bool),
            };

        case TelegramType.LOCATION:
            reader.stage = 'field';
            return { ...header, type: TelegramType.LOCATION, location: reader.readString() };

        case TelegramType.LOGGED_ADIF:
            reader.stage = 'field';
            return { ...header, type: TelegramType.LOGGED_ADIF, adifText: reader.readString() };

        case TelegramType.HIGHLIGHT_CALLSIGN:
            reader.stage = 'field';
            return {
                ...header,
                type: TelegramType.HIGHLIGHT_CALLSIGN,
                callsign: reader.readString(),
                backgroundColor: readColor(reader),
                foregroundColor: readColor(reader),
                highlightLastOnly: reader.readTail(bool),
            };

        case TelegramType.SWITCH_CONFIGURATION:
            reader.stage = 'field';
            return {
                ...header,
                type: TelegramType.SWITCH_CONFIGURATION,
                configurationName: reader.readString(),
            };

        case TelegramType.CONFIGURE:
            reader.stage = 'field';
            return {
                ...header,
                type: TelegramType.CONFIGURE,
                mode: reader.readString(),
                frequencyTolerance: unsetU32(reader),
                submode: reader.readString(),
                fastMode: reader.readBool(),
                trPeriod: unsetU32(reader),
                rxDF: unsetU32(reader),
                dxCall: reader.readString(),
                dxGrid: reader.readString(),
                generateMessages: reader.readBool(),
            };

        default:
            return null;
    }
}

/**
 * Encode a telegram for the given schema version (the telegram's own by
 * default). Targets older than OPTIONAL_FIELDS_SCHEMA_VERSION get none of the
 * optional trailing fields.
 */
export function encodeTelegram(telegram: Telegram, schemaVersion: number = telegram.schemaVersion): Buffer {
    const writer = new FrameWriter(schemaVersion >= OPTIONAL_FIELDS_SCHEMA_VERSION);

    writer.writeU32(MAGIC);
    writer.writeU32(schemaVersion);
    writer.writeU32(telegram.type);
    writer.writeString(telegram.id);

    writeBody(writer, telegram);
    return writer.toBuffer();
}

function writeBody(writer: FrameWriter, telegram: Telegram): void {
    switch (telegram.type) {
        case TelegramType.HEARTBEAT:
            writer.writeU32(telegram.maxSchemaVersion);
            writer.writeString(telegram.version);
            writer.writeTail(telegram.revision, putStr);
            return;

        case TelegramType.STATUS:
            writer.writeU64(telegram.dialFrequency);
            writer.writeString(telegram.mode);
            writer.writeString(telegram.dxCall);
            writer.writeString(telegram.report);
            writer.writeString(telegram.txMode);
            writer.writeBool(telegram.txEnabled);
            writer.writeBool(telegram.transmitting);
            writer.writeBool(telegram.decoding);
            writer.writeTail(telegram.rxDF, putU32);
            writer.writeTail(telegram.txDF, putU32);
            writer.writeTail(telegram.deCall, putStr);
            writer.writeTail(telegram.deGrid, putStr);
            writer.writeTail(telegram.dxGrid, putStr);
            writer.writeTail(telegram.txWatchdog, putBool);
            writer.writeTail(telegram.subMode, putStr);
            writer.writeTail(telegram.fastMode, putBool);
            writer.writeTail(telegram.specialOpMode, putU8);
            writer.writeTail(telegram.frequencyTolerance, putUnsetU32);
            writer.writeTail(telegram.trPeriod, putUnsetU32);
            writer.writeTail(telegram.configurationName, putStr);
            writer.writeTail(telegram.txMessage, putStr);
            return;

        case TelegramType.DECODE:
            writer.writeBool(telegram.newDecode);
            writer.writeU32(telegram.time);
            writer.writeI32(telegram.snr);
            writer.writeF64(telegram.deltaTime);
            writer.writeU32(telegram.deltaFrequency);
            writer.writeString(telegram.mode);
            writer.writeString(telegram.message);
            writer.writeTail(telegram.lowConfidence, putBool);
            writer.writeTail(telegram.offAir, putBool);
            return;

        case TelegramType.CLEAR:
            writer.writeTail(telegram.window, putU8);
            return;

        case TelegramType.REPLY:
            writer.writeU32(telegram.time);
            writer.writeI32(telegram.snr);
            writer.writeF64(telegram.deltaTime);
            writer.writeU32(telegram.deltaFrequency);
            writer.writeString(telegram.mode);
            writer.writeString(telegram.message);
            writer.writeBool(telegram.lowConfidence);
            writer.writeTail(telegram.modifiers, putU8);
            return;

        case TelegramType.QSO_LOGGED:
            writeDateTime(writer, telegram.timeOff);
            writer.writeString(telegram.dxCall);
            writer.writeString(telegram.dxGrid);
            writer.writeU64(telegram.txFrequency);
            writer.writeString(telegram.mode);
            writer.writeString(telegram.reportSent);
            writer.writeString(telegram.reportReceived);
            writer.writeString(telegram.txPower);
            writer.writeString(telegram.comments);
            writer.writeString(telegram.name);
            writer.writeTail(telegram.timeOn, putDateTime);
            writer.writeTail(telegram.operatorCall, putStr);
            writer.writeTail(telegram.myCall, putStr);
            writer.writeTail(telegram.myGrid, putStr);
            writer.writeTail(telegram.exchangeSent, putStr);
            writer.writeTail(telegram.exchangeReceived, putStr);
            writer.writeTail(telegram.adifPropagationMode, putStr);
            return;

        case TelegramType.CLOSE:
        case TelegramType.REPLAY:
            return;

        case TelegramType.HALT_TX:
            writer.writeBool(telegram.autoTxOnly);
            return;

        case TelegramType.FREE_TEXT:
            writer.writeString(telegram.text);
            writer.writeTail(telegram.send, putBool);
            return;

        case TelegramType.WSPR_DECODE:
            writer.writeBool(telegram.newDecode);
            writer.writeU32(telegram.time);
            writer.writeI32(telegram.snr);
            writer.writeF64(telegram.deltaTime);
            writer.writeU64(telegram.frequency);
            writer.writeI32(telegram.drift);
            writer.writeString(telegram.callsign);
            writer.writeString(telegram.grid);
            writer.writeI32(telegram.power);
            writer.writeTail(telegram.offAir, putBool);
            return;

        case TelegramType.LOCATION:
            writer.writeString(telegram.location);
            return;

        case TelegramType.LOGGED_ADIF:
            writer.writeString(telegram.adifText);
            return;

        case TelegramType.HIGHLIGHT_CALLSIGN:
            writer.writeString(telegram.callsign);
            putColor(writer, telegram.backgroundColor);
            putColor(writer, telegram.foregroundColor);
            writer.writeTail(telegram.highlightLastOnly, putBool);
            return;

        case TelegramType.SWITCH_CONFIGURATION:
            writer.writeString(telegram.configurationName);
            return;

        case TelegramType.CONFIGURE:
            writer.writeString(telegram.mode);
            putUnsetU32(writer, telegram.frequencyTolerance);
            writer.writeString(telegram.submode);
            writer.writeBool(telegram.fastMode);
            putUnsetU32(writer, telegram.trPeriod);
            putUnsetU32(writer, telegram.rxDF);
            writer.writeString(telegram.dxCall);
            writer.writeString(telegram.dxGrid);
            writer.writeBool(telegram.generateMessages);
            return;

        default: {
            const unknown: never = telegram;
            throw new TelegramEncodeError(`Cannot encode telegram ${JSON.stringify(unknown)}`);
        }
    }
}
