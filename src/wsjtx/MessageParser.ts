// Common FT8/FT4 message shapes and the station they yield:
//   CQ W1ABC FN42          -> W1ABC
//   CQ DX W1ABC FN42       -> W1ABC
//   W1ABC DL2XYZ JO31      -> DL2XYZ
//   W1ABC DL2XYZ -05       -> DL2XYZ
//   DL2XYZ W1ABC R-12      -> W1ABC
//   W1ABC DL2XYZ RR73      -> DL2XYZ
//   W1ABC DL2XYZ 73        -> DL2XYZ
//   W1ABC <PJ4/K1XY> RR73  -> PJ4/K1XY
// The second callsign is always the sender, which is the station to color.

const REPORT_PATTERN = /^R?[-+][0-9]{2}/;
const LOCATOR_PATTERN = /^[A-Z]{2}[0-9]{2}/;
const STANDARD_CALL_PATTERN = /^(?:[A-Z]|[A-Z][A-Z0-9]|[0-9][A-Z])[0-9][A-Z]{1,3}/;

// Unresolved hashed callsign
const UNKNOWN_HASH = '...';

export function isReport(token: string): boolean {
    return REPORT_PATTERN.test(token);
}

export function isLocator(token: string): boolean {
    return LOCATOR_PATTERN.test(token);
}

export function isStandardCallsign(token: string): boolean {
    return STANDARD_CALL_PATTERN.test(token);
}

function stripHash(token: string): string {
    return token.replace(/^</, '').replace(/>$/, '');
}

function isCallToken(token: string | undefined): token is string {
    return token !== undefined && token.length >= 3;
}

function senderToken(parts: string[]): string | null {
    const [first, second, third] = parts;

    if (first === 'CQ' || first === 'QRZ') {
        // CQ DX W1ABC FN42
        if (parts.length === 4 && isCallToken(third)) {
            return third;
        }
        // CQ DX W1ABC (no locator)
        if (parts.length === 3 && third !== undefined && third.length !== 4 &&
            second !== undefined && second.length <= 4 && isCallToken(third)) {
            return third;
        }
        if (isCallToken(second)) {
            return second;
        }
    }

    if (parts.length === 2 && isCallToken(second)) {
        return second;
    }
    if (parts.length < 2) {
        return null;
    }

    // W1ABC DL2XYZ R JO31
    if (parts.length === 4 && third === 'R' && isCallToken(second)) {
        return second;
    }

    if (parts.length === 3 && isCallToken(second)) {
        if (second.length > 3 || isStandardCallsign(second)) {
            return second;
        }
        if (third !== undefined && (isLocator(third) || isReport(third))) {
            return second;
        }
    }

    return null;
}

/**
 * Extract the transmitting station's callsign from a decoded message, or null
 * when the message has no recognizable shape (free text, contest exchanges).
 */
export function parseSenderCallsign(message: string | null): string | null {
    if (!message) {
        return null;
    }
    // DXpedition (Fox/Hound) messages carry several calls
    if (message.includes(';')) {
        return null;
    }

    const parts = message.trim().split(/\s+/);

    // Strip off marginal decode info (" a1", " ? a2")
    const last = parts[parts.length - 1];
    if (parts.length > 1 && last !== undefined && last.startsWith('a')) {
        parts.pop();
    }
    if (parts.length > 1 && parts[parts.length - 1] === '?') {
        parts.pop();
    }

    const token = senderToken(parts);
    if (!token) {
        return null;
    }
    const callsign = stripHash(token);
    if (!callsign || callsign === UNKNOWN_HASH) {
        return null;
    }
    return callsign;
}
