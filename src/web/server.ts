import express from 'express';
import { WebSocketServer, WebSocket } from 'ws';
import http from 'http';
import dgram from 'dgram';
import { Config } from '../config';
import { logger } from '../utils/logger';
import { operatingContext } from '../wsjtx/WorkedBeforeEngine';
import { LookupUnavailableError } from '../wsjtx/errors';
import { telegramTypeName } from '../wsjtx/TelegramCodec';
import { ContactLookup, HighlightCallsignTelegram, Telegram } from '../wsjtx/types';
import { SenderStatus, UdpDispatcher, senderKey } from '../wsjtx/UdpDispatcher';

export interface SenderSummary {
    sender: string;
    id: string;
    band: string | null;
    mode: string | null;
    dialFrequency: number;
}

export interface TelegramMessage {
    type: 'TELEGRAM';
    sender: string;
    telegramType: string;
    telegram: Telegram;
}

export interface HighlightMessage {
    type: 'HIGHLIGHT';
    sender: string;
    telegram: HighlightCallsignTelegram;
}

export interface WelcomeMessage {
    type: 'WELCOME';
    message: string;
    senders: SenderSummary[];
}

export type MonitorMessage = WelcomeMessage | TelegramMessage | HighlightMessage;

export function summarizeSender({ sender, status }: SenderStatus): SenderSummary {
    const context = operatingContext(status);
    return {
        sender,
        id: status.id,
        band: context?.band ?? null,
        mode: context?.mode ?? null,
        dialFrequency: status.dialFrequency,
    };
}

export function toTelegramMessage(telegram: Telegram, rinfo: dgram.RemoteInfo): TelegramMessage {
    return {
        type: 'TELEGRAM',
        sender: senderKey(rinfo),
        telegramType: telegramTypeName(telegram.type),
        telegram,
    };
}

export function toHighlightMessage(telegram: HighlightCallsignTelegram, rinfo: dgram.RemoteInfo): HighlightMessage {
    return {
        type: 'HIGHLIGHT',
        sender: senderKey(rinfo),
        telegram,
    };
}

/**
 * Read-only monitor: sender status and lookups over HTTP, a live telegram
 * feed over WebSocket.
 */
export class WebServer {
    private app: express.Application;
    private server: http.Server;
    private wss: WebSocketServer;
    private config: Config;
    private dispatcher: UdpDispatcher;
    private contactLookup: ContactLookup;

    constructor(config: Config, dispatcher: UdpDispatcher, contactLookup: ContactLookup) {
        this.config = config;
        this.dispatcher = dispatcher;
        this.contactLookup = contactLookup;
        this.app = express();
        this.server = http.createServer(this.app);
        this.wss = new WebSocketServer({ server: this.server });

        this.setupMiddleware();
        this.setupRoutes();
        this.setupWebSockets();
    }

    private setupMiddleware() {
        this.app.use((req, res, next) => {
            res.header('Access-Control-Allow-Origin', '*');
            res.header('Access-Control-Allow-Methods', 'GET, OPTIONS');
            res.header('Access-Control-Allow-Headers', 'Origin, X-Requested-With, Content-Type, Accept');
            if (req.method === 'OPTIONS') {
                res.sendStatus(200);
                return;
            }
            next();
        });
    }

    private setupRoutes() {
        this.app.get('/api/status', (req, res) => {
            res.json({ status: 'ok', senders: this.dispatcher.getSenders().map(summarizeSender) });
        });

        // API: Worked-before lookup, e.g. /api/lookup/K1ABC?band=20m&mode=FT8
        this.app.get('/api/lookup/:callsign', async (req, res) => {
            const { band, mode } = req.query;
            if (typeof band !== 'string' || !band || typeof mode !== 'string' || !mode) {
                res.status(400).json({ error: 'band and mode query parameters are required' });
                return;
            }

            try {
                const result = await this.contactLookup.lookup(req.params.callsign.toUpperCase(), band, mode);
                res.json({ callsign: req.params.callsign.toUpperCase(), band, mode, ...result });
            } catch (error) {
                if (error instanceof LookupUnavailableError) {
                    res.status(503).json({ error: error.message });
                    return;
                }
                logger.error('[Web] Lookup failed:', error);
                res.status(500).json({ error: String(error) });
            }
        });
    }

    private setupWebSockets() {
        this.wss.on('connection', (ws: WebSocket) => {
            const welcome: WelcomeMessage = {
                type: 'WELCOME',
                message: 'Connected to wsjtx-wbf',
                senders: this.dispatcher.getSenders().map(summarizeSender),
            };
            ws.send(JSON.stringify(welcome));
        });

        this.dispatcher.on('telegram', (telegram: Telegram, rinfo: dgram.RemoteInfo) => {
            this.broadcast(toTelegramMessage(telegram, rinfo));
        });

        this.dispatcher.on('highlight', (telegram: HighlightCallsignTelegram, rinfo: dgram.RemoteInfo) => {
            this.broadcast(toHighlightMessage(telegram, rinfo));
        });
    }

    private broadcast(message: MonitorMessage): void {
        if (this.wss.clients.size === 0) {
            return;
        }
        const json = JSON.stringify(message);

        this.wss.clients.forEach((client) => {
            if (client.readyState === WebSocket.OPEN) {
                client.send(json);
            }
        });
    }

    public start(): Promise<void> {
        const port = this.config.web.port;
        return new Promise((resolve, reject) => {
            this.server.once('error', reject);
            this.server.listen(port, () => {
                this.server.off('error', reject);
                logger.info(`[Web] Monitor running at http://localhost:${port}`);
                resolve();
            });
        });
    }

    public stop(): Promise<void> {
        this.wss.clients.forEach((client) => client.terminate());
        return new Promise((resolve) => {
            this.wss.close(() => {
                this.server.close(() => resolve());
            });
        });
    }
}
