interface BandEdge {
    band: string;
    lowHz: number;
    highHz: number;     // exclusive
}

// Amateur bands WSJT-X modes are used on
const BANDS: readonly BandEdge[] = [
    { band: '2200m', lowHz: 135_700, highHz: 137_800 },
    { band: '630m', lowHz: 472_000, highHz: 479_000 },
    { band: '160m', lowHz: 1_800_000, highHz: 2_000_000 },
    { band: '80m', lowHz: 3_500_000, highHz: 4_000_000 },
    { band: '60m', lowHz: 5_300_000, highHz: 5_500_000 },
    { band: '40m', lowHz: 7_000_000, highHz: 7_300_000 },
    { band: '30m', lowHz: 10_100_000, highHz: 10_150_000 },
    { band: '20m', lowHz: 14_000_000, highHz: 14_350_000 },
    { band: '17m', lowHz: 18_068_000, highHz: 18_168_000 },
    { band: '15m', lowHz: 21_000_000, highHz: 21_450_000 },
    { band: '12m', lowHz: 24_890_000, highHz: 24_990_000 },
    { band: '10m', lowHz: 28_000_000, highHz: 29_700_000 },
    { band: '6m', lowHz: 50_000_000, highHz: 54_000_000 },
    { band: '4m', lowHz: 70_000_000, highHz: 71_000_000 },
    { band: '2m', lowHz: 144_000_000, highHz: 148_000_000 },
    { band: '1.25m', lowHz: 222_000_000, highHz: 225_000_000 },
    { band: '70cm', lowHz: 420_000_000, highHz: 450_000_000 },
    { band: '33cm', lowHz: 902_000_000, highHz: 928_000_000 },
    { band: '23cm', lowHz: 1_240_000_000, highHz: 1_300_000_000 },
];

// Helper to convert dial frequency to band name, null outside every band
export function frequencyToBand(freqHz: number): string | null {
    const edge = BANDS.find((b) => freqHz >= b.lowHz && freqHz < b.highHz);
    return edge ? edge.band : null;
}

// Normalize band names (e.g., "20M" -> "20m", "20 m" -> "20m")
export function normalizeBand(band: string): string {
    return band.toLowerCase().replace(/\s+/g, '');
}

/**
 * Normalize mode names so log entries and Status telegrams compare equal.
 * ADIF files log FT4, Q65, FST4 and JS8 as MODE=MFSK with the real mode in
 * SUBMODE.
 */
export function normalizeMode(mode: string, submode?: string | null): string {
    const normalized = mode.trim().toUpperCase();
    if (normalized === 'MFSK' && submode) {
        return submode.trim().toUpperCase();
    }
    return normalized;
}
