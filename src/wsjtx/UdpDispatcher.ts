import dgram from 'dgram';
import { EventEmitter } from 'events';
import { logger } from '../utils/logger';
import { LookupUnavailableError, TelegramDecodeError, UnknownTypeError } from './errors';
import { decodeTelegram, encodeTelegram, telegramTypeName } from './TelegramCodec';
import {
    CURRENT_SCHEMA_VERSION,
    HeartbeatTelegram,
    HighlightCallsignTelegram,
    SpotTelegram,
    StatusTelegram,
    Telegram,
    TelegramType,
} from './types';
import { WorkedBeforeEngine } from './WorkedBeforeEngine';

// The parts of dgram.Socket the dispatcher uses
export interface DatagramSocket {
    on(event: 'message', listener: (msg: Buffer, rinfo: dgram.RemoteInfo) => void): unknown;
    on(event: 'error', listener: (err: Error) => void): unknown;
    bind(port: number, address: string, callback: () => void): unknown;
    send(msg: Buffer, port: number, address: string, callback: (error: Error | null) => void): void;
    close(callback: () => void): unknown;
}

export interface HeartbeatIdentity {
    id: string;
    schemaVersion: number;
    version: string;
    revision: string;
}

export interface UdpDispatcherOptions {
    host: string;
    port: number;
    // Answer inbound heartbeats so WSJT-X lists this server as a peer
    heartbeat?: HeartbeatIdentity;
}

export interface SenderStatus {
    sender: string;
    status: StatusTelegram;
}

export function senderKey(rinfo: dgram.RemoteInfo): string {
    return `${rinfo.address}:${rinfo.port}`;
}

/**
 * UDP endpoint for WSJT-X telegrams.
 *
 * Datagrams are processed one at a time per sender (address:port), so a
 * sender's Status always applies to its later decodes. Emits:
 * - 'telegram' (telegram, rinfo) for every decoded telegram
 * - 'highlight' (telegram, rinfo) after a HighlightCallsign was sent
 * - 'decode-error' (error, rinfo) for dropped datagrams
 * - 'lookup-error' (error, telegram, rinfo) when the contact lookup failed
 * - 'socket-error' (error) for socket errors after binding
 */
export class UdpDispatcher extends EventEmitter {
    private socket: DatagramSocket;
    private engine: WorkedBeforeEngine;
    private options: UdpDispatcherOptions;
    private statusBySender: Map<string, StatusTelegram> = new Map();
    private queues: Map<string, Promise<void>> = new Map();
    private accepting: boolean = false;
    private stopPromise: Promise<void> | null = null;

    constructor(engine: WorkedBeforeEngine, options: UdpDispatcherOptions, socket?: DatagramSocket) {
        super();
        this.engine = engine;
        this.options = options;
        this.socket = socket ?? dgram.createSocket('udp4');
    }

    public start(): Promise<void> {
        this.socket.on('message', (msg, rinfo) => {
            this.enqueue(msg, rinfo);
        });

        return new Promise((resolve, reject) => {
            let bound = false;

            this.socket.on('error', (err) => {
                if (!bound) {
                    reject(err);
                    return;
                }
                logger.error('[UDP] Socket error:', err);
                this.emit('socket-error', err);
            });

            this.socket.bind(this.options.port, this.options.host, () => {
                bound = true;
                this.accepting = true;
                logger.info(`[UDP] WSJT-X UDP server listening on ${this.options.host}:${this.options.port}`);
                resolve();
            });
        });
    }

    /**
     * Stop accepting datagrams, let queued ones finish, then release the socket.
     */
    public stop(): Promise<void> {
        if (!this.stopPromise) {
            this.accepting = false;
            this.stopPromise = this.drain().then(() => new Promise<void>((resolve) => {
                this.socket.close(() => {
                    logger.info('[UDP] WSJT-X UDP server stopped');
                    resolve();
                });
            }));
        }
        return this.stopPromise;
    }

    // Resolves once every queued datagram has been handled
    public async drain(): Promise<void> {
        while (this.queues.size > 0) {
            await Promise.all(this.queues.values());
        }
    }

    public getCurrentStatus(sender: string): StatusTelegram | undefined {
        return this.statusBySender.get(sender);
    }

    public getSenders(): SenderStatus[] {
        return Array.from(this.statusBySender, ([sender, status]) => ({ sender, status }));
    }

    private enqueue(msg: Buffer, rinfo: dgram.RemoteInfo): void {
        const sender = senderKey(rinfo);
        if (!this.accepting) {
            logger.debug(`[UDP] Not accepting datagrams, dropped ${msg.length} bytes from ${sender}`);
            return;
        }

        const previous = this.queues.get(sender) ?? Promise.resolve();
        const next: Promise<void> = previous
            .then(() => this.handleDatagram(msg, rinfo))
            .then(() => {
                if (this.queues.get(sender) === next) {
                    this.queues.delete(sender);
                }
            });
        this.queues.set(sender, next);
    }

    /**
     * Decode and route one datagram. Never rejects: failures are logged and
     * the datagram is dropped.
     */
    public async handleDatagram(msg: Buffer, rinfo: dgram.RemoteInfo): Promise<void> {
        const sender = senderKey(rinfo);

        let telegram: Telegram;
        try {
            telegram = decodeTelegram(msg);
        } catch (error) {
            this.reportDecodeError(error, msg, sender, rinfo);
            return;
        }

        try {
            await this.route(telegram, sender, rinfo);
        } catch (error) {
            logger.error(`[UDP] Failed to handle ${telegramTypeName(telegram.type)} from ${sender}:`, error);
        }
    }

    private reportDecodeError(error: unknown, msg: Buffer, sender: string, rinfo: dgram.RemoteInfo): void {
        if (!(error instanceof TelegramDecodeError)) {
            logger.error(`[UDP] Unexpected error decoding ${msg.length} bytes from ${sender}:`, error);
            return;
        }

        const typeCode = error instanceof UnknownTypeError ? ` type=${error.typeCode}` : '';
        logger.warn(
            `[UDP] Dropped ${msg.length}-byte datagram from ${sender}: ${error.name} ` +
            `stage=${error.stage} offset=${error.offset}${typeCode}`
        );
        this.emit('decode-error', error, rinfo);
    }

    private async route(telegram: Telegram, sender: string, rinfo: dgram.RemoteInfo): Promise<void> {
        this.notify(telegram, rinfo);

        switch (telegram.type) {
            case TelegramType.STATUS:
                this.statusBySender.set(sender, telegram);
                break;

            case TelegramType.DECODE:
            case TelegramType.WSPR_DECODE:
                await this.highlight(telegram, sender, rinfo);
                break;

            case TelegramType.HEARTBEAT:
                logger.debug(`[UDP] Heartbeat from ${telegram.id} at ${sender}`);
                await this.sendHeartbeat(rinfo);
                break;

            case TelegramType.CLOSE:
                logger.info(`[UDP] ${telegram.id} at ${sender} closed`);
                this.statusBySender.delete(sender);
                break;

            default:
                // Pass-through: only the 'telegram' listeners see it
                break;
        }
    }

    // A failing listener must not stop routing
    private notify(telegram: Telegram, rinfo: dgram.RemoteInfo): void {
        try {
            this.emit('telegram', telegram, rinfo);
        } catch (error) {
            logger.error(`[UDP] Telegram listener failed on ${telegramTypeName(telegram.type)}:`, error);
        }
    }

    private async highlight(telegram: SpotTelegram, sender: string, rinfo: dgram.RemoteInfo): Promise<void> {
        let reply: HighlightCallsignTelegram | null;
        try {
            reply = await this.engine.evaluate(telegram, this.statusBySender.get(sender));
        } catch (error) {
            if (error instanceof LookupUnavailableError) {
                logger.warn(`[WBF] Contact lookup unavailable, no highlight for ${sender}: ${error.message}`);
                this.emit('lookup-error', error, telegram, rinfo);
                return;
            }
            throw error;
        }

        if (!reply) {
            return;
        }

        await this.send(encodeTelegram(reply), rinfo);
        logger.debug(`[WBF] Highlighted ${reply.callsign} for ${telegram.id} at ${sender}`);
        this.emit('highlight', reply, rinfo);
    }

    private async sendHeartbeat(rinfo: dgram.RemoteInfo): Promise<void> {
        const identity = this.options.heartbeat;
        if (!identity) {
            return;
        }
        const heartbeat: HeartbeatTelegram = {
            type: TelegramType.HEARTBEAT,
            schemaVersion: identity.schemaVersion,
            id: identity.id,
            maxSchemaVersion: CURRENT_SCHEMA_VERSION,
            version: identity.version,
            revision: identity.revision,
        };
        await this.send(encodeTelegram(heartbeat), rinfo);
    }

    // Replies only ever go back to the datagram's sender
    private send(packet: Buffer, rinfo: dgram.RemoteInfo): Promise<void> {
        return new Promise((resolve, reject) => {
            this.socket.send(packet, rinfo.port, rinfo.address, (err) => {
                if (err) {
                    reject(err);
                    return;
                }
                resolve();
            });
        });
    }
}
