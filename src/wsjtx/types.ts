import type { QColor, QDateTime } from './qtypes';

// WSJT-X UDP telegram type codes (QDataStream encoding)
// Reference: Network/NetworkMessage.hpp in the WSJT-X sources
export enum TelegramType {
    HEARTBEAT = 0,          // Out/In - heartbeat with version info
    STATUS = 1,             // Out - status update (frequency, mode, etc.)
    DECODE = 2,             // Out - decoded message
    CLEAR = 3,              // Out/In - clear decode windows
    REPLY = 4,              // In - reply to a CQ/QRZ
    QSO_LOGGED = 5,         // Out - QSO logged
    CLOSE = 6,              // Out/In - application closing
    REPLAY = 7,             // In - request decode replay
    HALT_TX = 8,            // In - halt transmission
    FREE_TEXT = 9,          // In - set free text message
    WSPR_DECODE = 10,       // Out - WSPR decode
    LOCATION = 11,          // In - set grid location
    LOGGED_ADIF = 12,       // Out - ADIF log entry
    HIGHLIGHT_CALLSIGN = 13, // In - highlight a callsign
    SWITCH_CONFIGURATION = 14, // In - switch to named configuration
    CONFIGURE = 15,         // In - configure mode, frequency, etc.
}

export const MAGIC = 0xadbccbda;
export const CURRENT_SCHEMA_VERSION = 3;
// First schema version whose senders may append the optional trailing fields
export const OPTIONAL_FIELDS_SCHEMA_VERSION = 2;

// Shared header. Fields marked optional (?) below are the trailing fields a
// sender may leave out; null strings are Qt null strings, not absent fields.
export interface TelegramHeader {
    schemaVersion: number;
    id: string;
}

export interface HeartbeatTelegram extends TelegramHeader {
    type: TelegramType.HEARTBEAT;
    maxSchemaVersion: number;
    version: string | null;
    revision?: string | null;
}

export interface StatusTelegram extends TelegramHeader {
    type: TelegramType.STATUS;
    dialFrequency: number;
    mode: string | null;
    dxCall: string | null;
    report: string | null;
    txMode: string | null;
    txEnabled: boolean;
    transmitting: boolean;
    decoding: boolean;
    rxDF?: number;
    txDF?: number;
    deCall?: string | null;
    deGrid?: string | null;
    dxGrid?: string | null;
    txWatchdog?: boolean;
    subMode?: string | null;
    fastMode?: boolean;
    specialOpMode?: number;
    frequencyTolerance?: number | null;  // null = not set
    trPeriod?: number | null;            // null = not set
    configurationName?: string | null;
    txMessage?: string | null;
}

export interface DecodeTelegram extends TelegramHeader {
    type: TelegramType.DECODE;
    newDecode: boolean;
    time: number;               // ms since midnight UTC
    snr: number;
    deltaTime: number;          // seconds
    deltaFrequency: number;     // Hz
    mode: string | null;
    message: string | null;
    lowConfidence?: boolean;
    offAir?: boolean;
}

// Which decode window a Clear telegram targets
export enum ClearWindow {
    BAND_ACTIVITY = 0,
    RX_FREQUENCY = 1,
    BOTH = 2,
}

export interface ClearTelegram extends TelegramHeader {
    type: TelegramType.CLEAR;
    window?: ClearWindow;
}

export interface ReplyTelegram extends TelegramHeader {
    type: TelegramType.REPLY;
    time: number;
    snr: number;
    deltaTime: number;
    deltaFrequency: number;
    mode: string | null;
    message: string | null;
    lowConfidence: boolean;
    modifiers?: number;         // Qt::KeyboardModifiers >> 24
}

export interface QsoLoggedTelegram extends TelegramHeader {
    type: TelegramType.QSO_LOGGED;
    timeOff: QDateTime;
    dxCall: string | null;
    dxGrid: string | null;
    txFrequency: number;
    mode: string | null;
    reportSent: string | null;
    reportReceived: string | null;
    txPower: string | null;
    comments: string | null;
    name: string | null;
    timeOn?: QDateTime;
    operatorCall?: string | null;
    myCall?: string | null;
    myGrid?: string | null;
    exchangeSent?: string | null;
    exchangeReceived?: string | null;
    adifPropagationMode?: string | null;
}

export interface CloseTelegram extends TelegramHeader {
    type: TelegramType.CLOSE;
}

export interface ReplayTelegram extends TelegramHeader {
    type: TelegramType.REPLAY;
}

export interface HaltTxTelegram extends TelegramHeader {
    type: TelegramType.HALT_TX;
    autoTxOnly: boolean;
}

export interface FreeTextTelegram extends TelegramHeader {
    type: TelegramType.FREE_TEXT;
    text: string | null;
    send?: boolean;
}

export interface WsprDecodeTelegram extends TelegramHeader {
    type: TelegramType.WSPR_DECODE;
    newDecode: boolean;
    time: number;
    snr: number;
    deltaTime: number;
    frequency: number;
    drift: number;
    callsign: string | null;
    grid: string | null;
    power: number;              // dBm
    offAir?: boolean;
}

export interface LocationTelegram extends TelegramHeader {
    type: TelegramType.LOCATION;
    location: string | null;
}

export interface LoggedAdifTelegram extends TelegramHeader {
    type: TelegramType.LOGGED_ADIF;
    adifText: string | null;
}

export interface HighlightCallsignTelegram extends TelegramHeader {
    type: TelegramType.HIGHLIGHT_CALLSIGN;
    callsign: string | null;
    backgroundColor: QColor;
    foregroundColor: QColor;
    highlightLastOnly?: boolean;
}

export interface SwitchConfigurationTelegram extends TelegramHeader {
    type: TelegramType.SWITCH_CONFIGURATION;
    configurationName: string | null;
}

export interface ConfigureTelegram extends TelegramHeader {
    type: TelegramType.CONFIGURE;
    mode: string | null;
    frequencyTolerance: number | null;  // null = no change
    submode: string | null;
    fastMode: boolean;
    trPeriod: number | null;            // null = no change
    rxDF: number | null;                // null = no change
    dxCall: string | null;
    dxGrid: string | null;
    generateMessages: boolean;
}

export type Telegram =
    | HeartbeatTelegram
    | StatusTelegram
    | DecodeTelegram
    | ClearTelegram
    | ReplyTelegram
    | QsoLoggedTelegram
    | CloseTelegram
    | ReplayTelegram
    | HaltTxTelegram
    | FreeTextTelegram
    | WsprDecodeTelegram
    | LocationTelegram
    | LoggedAdifTelegram
    | HighlightCallsignTelegram
    | SwitchConfigurationTelegram
    | ConfigureTelegram;

// Telegrams the worked-before engine evaluates
export type SpotTelegram = DecodeTelegram | WsprDecodeTelegram;

// Band argument that widens a lookup to every band
export const ANY_BAND = '*';

export interface ContactLookupResult {
    worked: boolean;
    confirmed: boolean;
    dxccEntity?: string;
}

/**
 * Worked-before source (log file, QSO database, ...). Implementations throw
 * LookupUnavailableError when they cannot answer.
 */
export interface ContactLookup {
    lookup(callsign: string, band: string, mode: string): Promise<ContactLookupResult>;
}

// Color class of a not-yet-worked callsign
export type HighlightStatus = 'new_call' | 'new_call_band' | 'highlight';
