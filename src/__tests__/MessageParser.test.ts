import { describe, expect, it } from 'vitest';
import { isLocator, isReport, isStandardCallsign, parseSenderCallsign } from '../wsjtx/MessageParser';

describe('parseSenderCallsign', () => {
    it.each([
        ['CQ K1ABC FN42', 'K1ABC'],
        ['CQ DX K1ABC FN42', 'K1ABC'],
        ['CQ NA K1ABC', 'K1ABC'],
        ['CQ TEST K1ABC FN42', 'K1ABC'],
        ['QRZ K1ABC FN42', 'K1ABC'],
        ['K1ABC DL2XYZ JO31', 'DL2XYZ'],
        ['K1ABC DL2XYZ -05', 'DL2XYZ'],
        ['DL2XYZ K1ABC R-12', 'K1ABC'],
        ['K1ABC DL2XYZ R JO31', 'DL2XYZ'],
        ['K1ABC DL2XYZ RR73', 'DL2XYZ'],
        ['K1ABC DL2XYZ RRR', 'DL2XYZ'],
        ['K1ABC DL2XYZ 73', 'DL2XYZ'],
        ['K1ABC D1X 73', 'D1X'],
        ['K1ABC <PJ4/K1XY> RR73', 'PJ4/K1XY'],
        ['<K1ABC> DL2XYZ', 'DL2XYZ'],
    ])('takes the sender from "%s"', (message, expected) => {
        expect(parseSenderCallsign(message)).toBe(expected);
    });

    it('strips marginal decode markers', () => {
        expect(parseSenderCallsign('CQ K1ABC FN42 a1')).toBe('K1ABC');
        expect(parseSenderCallsign('K1ABC DL2XYZ -05 ? a2')).toBe('DL2XYZ');
    });

    it('ignores surrounding whitespace', () => {
        expect(parseSenderCallsign('  CQ   K1ABC  FN42 ')).toBe('K1ABC');
    });

    it.each([
        'DL2XYZ 73',
        'EFHW 50W 73',
        'TNX BOB 73 GL',
        'CQ',
        'K1ABC RR73; DL2XYZ <PJ4/K1XY> -10',
        'K1ABC <...> RR73',
    ])('finds no sender in "%s"', (message) => {
        expect(parseSenderCallsign(message)).toBeNull();
    });

    it('handles empty and null messages', () => {
        expect(parseSenderCallsign('')).toBeNull();
        expect(parseSenderCallsign(null)).toBeNull();
    });
});

describe('token classifiers', () => {
    it('recognizes signal reports', () => {
        expect(isReport('-05')).toBe(true);
        expect(isReport('R+10')).toBe(true);
        expect(isReport('RR73')).toBe(false);
    });

    it('recognizes locators', () => {
        expect(isLocator('FN42')).toBe(true);
        expect(isLocator('K1AB')).toBe(false);
    });

    it('recognizes standard callsigns', () => {
        expect(isStandardCallsign('K1ABC')).toBe(true);
        expect(isStandardCallsign('9A1AA')).toBe(true);
        expect(isStandardCallsign('50W')).toBe(false);
    });
});
