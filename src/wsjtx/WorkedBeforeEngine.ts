import { logger } from '../utils/logger';
import { frequencyToBand, normalizeMode } from './bandplan';
import { LookupUnavailableError } from './errors';
import { parseSenderCallsign } from './MessageParser';
import { QColor } from './qtypes';
import {
    ANY_BAND,
    ContactLookup,
    ContactLookupResult,
    CURRENT_SCHEMA_VERSION,
    HighlightCallsignTelegram,
    HighlightStatus,
    SpotTelegram,
    StatusTelegram,
    TelegramType,
} from './types';

export interface HighlightColors {
    foreground: QColor;
    background: QColor;
}

export interface WorkedBeforeOptions {
    colors: Record<HighlightStatus, HighlightColors>;
    // DXCC entity codes that get the 'highlight' class once confirmed
    highlightDxcc?: Iterable<string>;
    schemaVersion?: number;
}

// Band and mode a spot is judged against
export interface OperatingContext {
    band: string;
    mode: string;
}

export function operatingContext(status: StatusTelegram | undefined): OperatingContext | null {
    if (!status || !status.mode) {
        return null;
    }
    const band = frequencyToBand(status.dialFrequency);
    if (!band) {
        return null;
    }
    return { band, mode: normalizeMode(status.mode, status.subMode) };
}

function spotCallsign(telegram: SpotTelegram): string | null {
    if (telegram.type === TelegramType.WSPR_DECODE) {
        const callsign = telegram.callsign?.replace(/^</, '').replace(/>$/, '').trim();
        return callsign ? callsign : null;
    }
    return parseSenderCallsign(telegram.message);
}

/**
 * Decides whether a spotted callsign is new on the current band and mode and,
 * if so, builds the HighlightCallsign telegram that colors it. Stateless: every
 * decode is evaluated again.
 */
export class WorkedBeforeEngine {
    private contactLookup: ContactLookup;
    private colors: Record<HighlightStatus, HighlightColors>;
    private highlightDxcc: Set<string>;
    private schemaVersion: number;

    constructor(contactLookup: ContactLookup, options: WorkedBeforeOptions) {
        this.contactLookup = contactLookup;
        this.colors = options.colors;
        this.highlightDxcc = new Set(options.highlightDxcc ?? []);
        this.schemaVersion = options.schemaVersion ?? CURRENT_SCHEMA_VERSION;
    }

    /**
     * @param status - last Status telegram from the same sender, for band/mode
     * @returns the highlight to send back, or null when nothing should be sent
     * @throws LookupUnavailableError when the contact lookup fails
     */
    public async evaluate(
        telegram: SpotTelegram,
        status: StatusTelegram | undefined
    ): Promise<HighlightCallsignTelegram | null> {
        const callsign = spotCallsign(telegram);
        if (!callsign) {
            return null;
        }

        const context = operatingContext(status);
        if (!context) {
            logger.debug(`[WBF] No band/mode known for ${telegram.id}, skipping ${callsign}`);
            return null;
        }

        const highlightStatus = await this.classify(callsign, context);
        if (!highlightStatus) {
            return null;
        }

        const colors = this.colors[highlightStatus];
        return {
            type: TelegramType.HIGHLIGHT_CALLSIGN,
            schemaVersion: this.schemaVersion,
            id: telegram.id,
            callsign,
            backgroundColor: colors.background,
            foregroundColor: colors.foreground,
            highlightLastOnly: true,
        };
    }

    /**
     * Color class of a callsign, or null when it was worked on this band and
     * mode. Only an exact band+mode contact counts as worked; the any-band
     * lookup just picks between the "new" classes.
     */
    public async classify(callsign: string, context: OperatingContext): Promise<HighlightStatus | null> {
        const onBand = await this.query(callsign, context.band, context.mode);
        if (onBand.worked) {
            return null;
        }

        const anyBand = await this.query(callsign, ANY_BAND, context.mode);
        if (anyBand.confirmed && anyBand.dxccEntity && this.highlightDxcc.has(anyBand.dxccEntity)) {
            return 'highlight';
        }
        return anyBand.worked ? 'new_call_band' : 'new_call';
    }

    private async query(callsign: string, band: string, mode: string): Promise<ContactLookupResult> {
        try {
            return await this.contactLookup.lookup(callsign, band, mode);
        } catch (error) {
            if (error instanceof LookupUnavailableError) {
                throw error;
            }
            throw new LookupUnavailableError(`Contact lookup failed for ${callsign}`, { cause: error });
        }
    }
}
