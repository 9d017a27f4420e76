#!/usr/bin/env node
import { Config, getConfigFilePath, loadConfig } from './config';
import { logger } from './utils/logger';
import { AdifLogReader } from './wsjtx/AdifLogReader';
import { parseHexColor } from './wsjtx/qtypes';
import { HighlightStatus, Telegram, TelegramType } from './wsjtx/types';
import { UdpDispatcher } from './wsjtx/UdpDispatcher';
import { HighlightColors, WorkedBeforeEngine } from './wsjtx/WorkedBeforeEngine';
import { WebServer } from './web/server';

function highlightColors(config: Config): Record<HighlightStatus, HighlightColors> {
    const { colors } = config.highlight;
    const pair = (entry: { foreground: string; background: string }): HighlightColors => ({
        foreground: parseHexColor(entry.foreground),
        background: parseHexColor(entry.background),
    });
    return {
        new_call: pair(colors.new_call),
        new_call_band: pair(colors.new_call_band),
        highlight: pair(colors.highlight),
    };
}

async function main() {
    let config: Config;
    try {
        config = loadConfig();
    } catch (error) {
        logger.error(`Invalid configuration in ${getConfigFilePath()}:`, error);
        process.exit(1);
    }

    logger.configure({ level: config.logging.level, file: config.logging.file });
    logger.info('Starting wsjtx-wbf...');

    const logReader = new AdifLogReader(config.adif.path, {
        watchIntervalMs: config.adif.watchIntervalSeconds * 1000,
    });
    if (!config.adif.path) {
        logger.warn('[ADIF] No log file configured, every callsign is new');
    }

    const engine = new WorkedBeforeEngine(logReader, {
        colors: highlightColors(config),
        highlightDxcc: config.highlight.dxcc,
        schemaVersion: config.server.schemaVersion,
    });

    const dispatcher = new UdpDispatcher(engine, {
        host: config.udp.host,
        port: config.udp.port,
        heartbeat: {
            id: config.server.id,
            schemaVersion: config.server.schemaVersion,
            version: config.server.version,
            revision: config.server.revision,
        },
    });

    // Contacts logged while running count as worked right away
    dispatcher.on('telegram', (telegram: Telegram) => {
        if (telegram.type === TelegramType.LOGGED_ADIF && telegram.adifText) {
            logReader.addRecord(telegram.adifText);
        }
    });

    const webServer = config.web.enabled ? new WebServer(config, dispatcher, logReader) : null;

    let shuttingDown = false;
    const shutdown = async (signal: string) => {
        if (shuttingDown) {
            return;
        }
        shuttingDown = true;
        logger.info(`Received ${signal}, shutting down...`);
        logReader.stop();
        try {
            await Promise.all([dispatcher.stop(), webServer?.stop()]);
        } catch (error) {
            logger.error('Error during shutdown:', error);
        }
        logger.close();
        process.exit(0);
    };

    try {
        await dispatcher.start();
        if (webServer) {
            await webServer.start();
        }
    } catch (error) {
        logger.error('Failed to start server:', error);
        logReader.stop();
        process.exit(1);
    }

    process.on('SIGINT', () => {
        void shutdown('SIGINT');
    });
    process.on('SIGTERM', () => {
        void shutdown('SIGTERM');
    });
}

main().catch((error: unknown) => {
    logger.error('Fatal error:', error);
    process.exit(1);
});
