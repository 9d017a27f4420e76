import fs from 'fs';
import { logger } from '../utils/logger';
import { frequencyToBand, normalizeBand, normalizeMode } from './bandplan';
import { LookupUnavailableError } from './errors';
import { ANY_BAND, ContactLookup, ContactLookupResult } from './types';

interface WorkedEntry {
    band: string;
    mode: string;
    confirmed: boolean;
    dxccEntity?: string;
}

export interface AdifLogReaderOptions {
    // Poll the file for changes; 0 disables watching
    watchIntervalMs?: number;
}

/**
 * Worked-before index built from an ADIF log, keyed by callsign and scoped by
 * band and mode. An empty path is an empty log; a configured file that cannot
 * be read leaves the reader unavailable until a reload succeeds.
 */
export class AdifLogReader implements ContactLookup {
    private logPath: string;
    private workedStations: Map<string, WorkedEntry[]> = new Map();
    private recordCount: number = 0;
    private available: boolean = true;
    private lastModified: number = 0;
    private watchInterval: NodeJS.Timeout | null = null;

    constructor(logPath: string, options: AdifLogReaderOptions = {}) {
        this.logPath = logPath;
        if (logPath) {
            this.load();
            const interval = options.watchIntervalMs ?? 30000;
            if (interval > 0) {
                this.startWatching(interval);
            }
        }
    }

    private startWatching(intervalMs: number): void {
        this.watchInterval = setInterval(() => {
            this.checkForUpdates();
        }, intervalMs);
    }

    private checkForUpdates(): void {
        try {
            const stats = fs.statSync(this.logPath);
            if (stats.mtimeMs > this.lastModified) {
                logger.info('[ADIF] Log file changed, reloading...');
                this.reload();
            }
        } catch (error) {
            logger.debug(`[ADIF] Cannot stat ${this.logPath}:`, error instanceof Error ? error.message : String(error));
        }
    }

    public reload(): void {
        this.workedStations.clear();
        this.recordCount = 0;
        this.lastModified = 0;
        if (this.logPath) {
            this.load();
        }
    }

    private load(): void {
        try {
            const stats = fs.statSync(this.logPath);
            this.lastModified = stats.mtimeMs;

            const content = fs.readFileSync(this.logPath, 'utf-8');
            const count = this.parseAdif(content);
            this.available = true;

            logger.info(`[ADIF] Loaded ${count} QSOs from ${this.logPath}`);
        } catch (error) {
            this.available = false;
            logger.error(`[ADIF] Error loading ${this.logPath}:`, error instanceof Error ? error.message : String(error));
        }
    }

    /**
     * Add the records of a LoggedADIF telegram (header included) to the index.
     * Returns the number of QSOs added.
     */
    public addRecord(adifText: string): number {
        const count = this.parseAdif(adifText);
        if (count > 0) {
            logger.info(`[ADIF] Added ${count} logged QSO(s)`);
        }
        return count;
    }

    private parseAdif(content: string): number {
        // Skip header (everything before <eoh>)
        const headerEnd = content.toLowerCase().indexOf('<eoh>');
        const records = headerEnd >= 0 ? content.substring(headerEnd + 5) : content;

        let added = 0;
        // Split into QSO records (each ends with <eor>)
        for (const qso of records.split(/<eor>/i)) {
            if (!qso.trim()) continue;

            const parsed = this.parseQsoRecord(qso);
            if (parsed) {
                const entries = this.workedStations.get(parsed.callsign) ?? [];
                entries.push(parsed.entry);
                this.workedStations.set(parsed.callsign, entries);
                added++;
            }
        }

        this.recordCount += added;
        return added;
    }

    private parseQsoRecord(record: string): { callsign: string; entry: WorkedEntry } | null {
        const fields = this.extractAdifFields(record);

        const callsign = fields.get('call')?.trim().toUpperCase();
        if (!callsign) return null;

        const band = this.recordBand(fields);
        const mode = fields.get('mode');
        if (!band || !mode) return null;

        const confirmed = fields.get('lotw_qsl_rcvd')?.toUpperCase() === 'Y' ||
            fields.get('qsl_rcvd')?.toUpperCase() === 'Y';
        const dxcc = fields.get('dxcc')?.trim();

        return {
            callsign,
            entry: {
                band,
                mode: normalizeMode(mode, fields.get('submode')),
                confirmed,
                dxccEntity: dxcc && /^\d+$/.test(dxcc) ? dxcc.padStart(3, '0') : undefined,
            },
        };
    }

    private recordBand(fields: Map<string, string>): string | null {
        const band = fields.get('band');
        if (band) {
            return normalizeBand(band);
        }
        // FREQ is in MHz
        const freq = parseFloat(fields.get('freq') ?? '');
        return Number.isFinite(freq) ? frequencyToBand(Math.round(freq * 1_000_000)) : null;
    }

    private extractAdifFields(record: string): Map<string, string> {
        const fields = new Map<string, string>();

        // ADIF format: <FIELDNAME:LENGTH>VALUE or <FIELDNAME:LENGTH:TYPE>VALUE
        const fieldPattern = /<([A-Za-z0-9_]+):(\d+)(?::[A-Za-z])?>/g;
        let match: RegExpExecArray | null;

        while ((match = fieldPattern.exec(record)) !== null) {
            const fieldName = match[1].toLowerCase();
            const length = parseInt(match[2], 10);
            const valueStart = match.index + match[0].length;
            fields.set(fieldName, record.substring(valueStart, valueStart + length));
        }

        return fields;
    }

    public async lookup(callsign: string, band: string, mode: string): Promise<ContactLookupResult> {
        if (!this.available) {
            throw new LookupUnavailableError(`ADIF log ${this.logPath} is not loaded`);
        }

        const wantedBand = band === ANY_BAND ? ANY_BAND : normalizeBand(band);
        const wantedMode = normalizeMode(mode);
        const matches = (this.workedStations.get(callsign.toUpperCase()) ?? [])
            .filter((e) => (wantedBand === ANY_BAND || e.band === wantedBand) && e.mode === wantedMode);

        const withDxcc = matches.find((e) => e.dxccEntity !== undefined);
        return {
            worked: matches.length > 0,
            confirmed: matches.some((e) => e.confirmed),
            dxccEntity: withDxcc?.dxccEntity,
        };
    }

    public isAvailable(): boolean {
        return this.available;
    }

    public getWorkedCount(): number {
        return this.recordCount;
    }

    public stop(): void {
        if (this.watchInterval) {
            clearInterval(this.watchInterval);
            this.watchInterval = null;
        }
    }
}
