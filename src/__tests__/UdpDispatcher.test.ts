import dgram from 'dgram';
import { EventEmitter } from 'events';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { LookupUnavailableError, TelegramDecodeError } from '../wsjtx/errors';
import { rgbColor } from '../wsjtx/qtypes';
import { decodeTelegram, encodeTelegram } from '../wsjtx/TelegramCodec';
import {
    ContactLookupResult,
    DecodeTelegram,
    HighlightStatus,
    StatusTelegram,
    Telegram,
    TelegramType,
} from '../wsjtx/types';
import { DatagramSocket, UdpDispatcher } from '../wsjtx/UdpDispatcher';
import { HighlightColors, WorkedBeforeEngine } from '../wsjtx/WorkedBeforeEngine';

interface SentDatagram {
    msg: Buffer;
    port: number;
    address: string;
}

class FakeSocket extends EventEmitter implements DatagramSocket {
    public sent: SentDatagram[] = [];
    public bound: { port: number; address: string } | null = null;
    public closeCount = 0;

    bind(port: number, address: string, callback: () => void): void {
        this.bound = { port, address };
        callback();
    }

    send(msg: Buffer, port: number, address: string, callback: (error: Error | null) => void): void {
        this.sent.push({ msg, port, address });
        callback(null);
    }

    close(callback: () => void): void {
        this.closeCount++;
        callback();
    }

    deliver(telegram: Telegram | Buffer, rinfo: dgram.RemoteInfo): void {
        const msg = Buffer.isBuffer(telegram) ? telegram : encodeTelegram(telegram);
        this.emit('message', msg, { ...rinfo, size: msg.length });
    }
}

const COLOR: HighlightColors = { foreground: rgbColor(0, 0, 0), background: rgbColor(0, 255, 255) };
const COLORS: Record<HighlightStatus, HighlightColors> = {
    new_call: COLOR,
    new_call_band: COLOR,
    highlight: COLOR,
};

const ALICE: dgram.RemoteInfo = { address: '127.0.0.1', family: 'IPv4', port: 50001, size: 0 };
const BOB: dgram.RemoteInfo = { address: '127.0.0.1', family: 'IPv4', port: 50002, size: 0 };

const STATUS: StatusTelegram = {
    type: TelegramType.STATUS,
    schemaVersion: 3,
    id: 'WSJT-X',
    dialFrequency: 14_074_000,
    mode: 'FT8',
    dxCall: null,
    report: null,
    txMode: 'FT8',
    txEnabled: false,
    transmitting: false,
    decoding: true,
};

function decodeOf(message: string): DecodeTelegram {
    return {
        type: TelegramType.DECODE,
        schemaVersion: 3,
        id: 'WSJT-X',
        newDecode: true,
        time: 45_000_000,
        snr: -8,
        deltaTime: 0.1,
        deltaFrequency: 900,
        mode: '~',
        message,
    };
}

describe('UdpDispatcher', () => {
    let socket: FakeSocket;
    let lookup: (callsign: string, band: string, mode: string) => Promise<ContactLookupResult>;
    let dispatcher: UdpDispatcher;

    beforeEach(async () => {
        socket = new FakeSocket();
        lookup = async () => ({ worked: false, confirmed: false });
        const engine = new WorkedBeforeEngine(
            { lookup: (callsign, band, mode) => lookup(callsign, band, mode) },
            { colors: COLORS }
        );
        dispatcher = new UdpDispatcher(engine, {
            host: '127.0.0.1',
            port: 2237,
            heartbeat: { id: 'wsjtx-wbf', schemaVersion: 3, version: '1.0.0', revision: '' },
        }, socket);
        await dispatcher.start();
    });

    it('binds the configured endpoint', () => {
        expect(socket.bound).toEqual({ port: 2237, address: '127.0.0.1' });
    });

    it('replies to the sender of a new callsign', async () => {
        const highlights = vi.fn();
        dispatcher.on('highlight', highlights);

        socket.deliver(STATUS, ALICE);
        socket.deliver(decodeOf('CQ K1ABC FN42'), ALICE);
        await dispatcher.drain();

        expect(socket.sent).toHaveLength(1);
        expect(socket.sent[0]).toMatchObject({ port: 50001, address: '127.0.0.1' });
        const reply = decodeTelegram(socket.sent[0].msg);
        expect(reply).toMatchObject({
            type: TelegramType.HIGHLIGHT_CALLSIGN,
            id: 'WSJT-X',
            callsign: 'K1ABC',
            highlightLastOnly: true,
        });
        expect(highlights).toHaveBeenCalledTimes(1);
    });

    it('keeps status per sender', async () => {
        socket.deliver(STATUS, ALICE);
        socket.deliver(decodeOf('CQ K1ABC FN42'), BOB);
        await dispatcher.drain();

        expect(socket.sent).toHaveLength(0);
        expect(dispatcher.getCurrentStatus('127.0.0.1:50001')).toEqual(STATUS);
        expect(dispatcher.getCurrentStatus('127.0.0.1:50002')).toBeUndefined();
    });

    it('keeps only the latest status', async () => {
        socket.deliver(STATUS, ALICE);
        socket.deliver({ ...STATUS, dialFrequency: 7_074_000 }, ALICE);
        await dispatcher.drain();

        expect(dispatcher.getSenders()).toEqual([
            { sender: '127.0.0.1:50001', status: { ...STATUS, dialFrequency: 7_074_000 } },
        ]);
    });

    it('sends nothing for worked callsigns', async () => {
        lookup = async () => ({ worked: true, confirmed: true });

        socket.deliver(STATUS, ALICE);
        socket.deliver(decodeOf('CQ K1ABC FN42'), ALICE);
        await dispatcher.drain();

        expect(socket.sent).toHaveLength(0);
    });

    it('sends nothing when the lookup is unavailable', async () => {
        const lookupErrors = vi.fn();
        dispatcher.on('lookup-error', lookupErrors);
        lookup = async () => {
            throw new LookupUnavailableError('log offline');
        };

        socket.deliver(STATUS, ALICE);
        socket.deliver(decodeOf('CQ K1ABC FN42'), ALICE);
        await dispatcher.drain();

        expect(socket.sent).toHaveLength(0);
        expect(lookupErrors).toHaveBeenCalledTimes(1);
        expect(lookupErrors.mock.calls[0][0]).toBeInstanceOf(LookupUnavailableError);
    });

    it('drops undecodable datagrams and keeps going', async () => {
        const decodeErrors = vi.fn();
        const telegrams = vi.fn();
        dispatcher.on('decode-error', decodeErrors);
        dispatcher.on('telegram', telegrams);

        socket.deliver(Buffer.from('not a telegram'), ALICE);
        socket.deliver(STATUS, ALICE);
        await dispatcher.drain();

        expect(decodeErrors).toHaveBeenCalledTimes(1);
        expect(decodeErrors.mock.calls[0][0]).toBeInstanceOf(TelegramDecodeError);
        expect(telegrams).toHaveBeenCalledTimes(1);
        expect(dispatcher.getCurrentStatus('127.0.0.1:50001')).toEqual(STATUS);
    });

    it('answers heartbeats with its own', async () => {
        socket.deliver({
            type: TelegramType.HEARTBEAT,
            schemaVersion: 3,
            id: 'WSJT-X',
            maxSchemaVersion: 3,
            version: '2.6.1',
            revision: 'test',
        }, BOB);
        await dispatcher.drain();

        expect(socket.sent).toHaveLength(1);
        expect(socket.sent[0].port).toBe(50002);
        expect(decodeTelegram(socket.sent[0].msg)).toEqual({
            type: TelegramType.HEARTBEAT,
            schemaVersion: 3,
            id: 'wsjtx-wbf',
            maxSchemaVersion: 3,
            version: '1.0.0',
            revision: '',
        });
    });

    it('forgets a sender once it closes', async () => {
        socket.deliver(STATUS, ALICE);
        socket.deliver({ type: TelegramType.CLOSE, schemaVersion: 3, id: 'WSJT-X' }, ALICE);
        await dispatcher.drain();

        expect(dispatcher.getSenders()).toEqual([]);
    });

    it('passes other telegrams to listeners only', async () => {
        const telegrams = vi.fn();
        dispatcher.on('telegram', telegrams);

        socket.deliver({ type: TelegramType.CLEAR, schemaVersion: 3, id: 'WSJT-X', window: 2 }, ALICE);
        await dispatcher.drain();

        expect(telegrams).toHaveBeenCalledWith(
            { type: TelegramType.CLEAR, schemaVersion: 3, id: 'WSJT-X', window: 2 },
            expect.objectContaining({ port: 50001 })
        );
        expect(socket.sent).toHaveLength(0);
    });

    it('keeps routing when a listener throws', async () => {
        dispatcher.on('telegram', () => {
            throw new Error('listener failed');
        });

        socket.deliver(STATUS, ALICE);
        socket.deliver(decodeOf('CQ K1ABC FN42'), ALICE);
        await dispatcher.drain();

        expect(socket.sent).toHaveLength(1);
    });

    it('finishes queued datagrams before closing the socket', async () => {
        socket.deliver(STATUS, ALICE);
        socket.deliver(decodeOf('CQ K1ABC FN42'), ALICE);

        const first = dispatcher.stop();
        const second = dispatcher.stop();
        await Promise.all([first, second]);

        expect(socket.sent).toHaveLength(1);
        expect(socket.closeCount).toBe(1);
    });

    it('ignores datagrams after stopping', async () => {
        await dispatcher.stop();
        socket.deliver(STATUS, ALICE);
        await dispatcher.drain();

        expect(dispatcher.getSenders()).toEqual([]);
    });
});
