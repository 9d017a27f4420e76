import { z } from 'zod';
import fs from 'fs';
import path from 'path';

const HexColorSchema = z.string().regex(/^#[0-9a-fA-F]{6}$/, 'Expected a #rrggbb color');

const ColorPairSchema = (foreground: string, background: string) => z.object({
    foreground: HexColorSchema.default(foreground),
    background: HexColorSchema.default(background),
}).default({});

export const ConfigSchema = z.object({
    // WSJT-X UDP server endpoint
    udp: z.object({
        host: z.string().default('127.0.0.1'),
        port: z.coerce.number().int().min(1).max(65535).default(2237),
    }).default({}),
    // How this server identifies itself in Heartbeat / HighlightCallsign telegrams
    server: z.object({
        id: z.string().min(1).default('wsjtx-wbf'),
        // HighlightCallsign exists from schema 2 on
        schemaVersion: z.number().int().min(2).max(3).default(3),
        version: z.string().default('1.0.0'),
        revision: z.string().default(''),
    }).default({}),
    adif: z.object({
        path: z.string().default(''),                    // ADIF log with worked-before data
        watchIntervalSeconds: z.number().min(0).default(30), // 0 disables reloading
    }).default({}),
    highlight: z.object({
        dxcc: z.array(z.string()).default([]),           // DXCC entity codes, e.g. "291"
        // Foreground/background per color class
        colors: z.object({
            new_call: ColorPairSchema('#000000', '#00ffff'),       // never worked in this mode - cyan
            new_call_band: ColorPairSchema('#000000', '#99ffff'),  // worked on another band - light cyan
            highlight: ColorPairSchema('#000000', '#ffa000'),      // DXCC on the highlight list - orange
        }).default({}),
    }).default({}),
    // Monitor dashboard API
    web: z.object({
        enabled: z.boolean().default(false),
        port: z.coerce.number().int().min(1).max(65535).default(3000),
    }).default({}),
    logging: z.object({
        level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
        file: z.string().default(''),
    }).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

const CONFIG_FILE = path.join(process.cwd(), 'config.json');

function readConfigFile(configFile: string): unknown {
    if (!fs.existsSync(configFile)) {
        return {};
    }
    const fileContent = fs.readFileSync(configFile, 'utf-8');
    return JSON.parse(fileContent);
}

export function loadConfig(configFile: string = CONFIG_FILE, env: NodeJS.ProcessEnv = process.env): Config {
    const fileConfig = ConfigSchema.parse(readConfigFile(configFile));

    // Merge with env vars (env vars take precedence)
    const highlightDxcc = env.WBF_HIGHLIGHT
        ? env.WBF_HIGHLIGHT.split(',').map((code) => code.trim()).filter((code) => code.length > 0)
        : fileConfig.highlight.dxcc;

    return ConfigSchema.parse({
        ...fileConfig,
        udp: {
            host: env.WSJTX_UDP_HOST || fileConfig.udp.host,
            port: env.WSJTX_UDP_PORT || fileConfig.udp.port,
        },
        adif: {
            ...fileConfig.adif,
            path: env.WBF_PATH ?? fileConfig.adif.path,
        },
        highlight: {
            ...fileConfig.highlight,
            dxcc: highlightDxcc,
        },
        web: env.WEB_PORT ? { enabled: true, port: env.WEB_PORT } : fileConfig.web,
        logging: {
            ...fileConfig.logging,
            level: env.LOG_LEVEL || fileConfig.logging.level,
        },
    });
}

export function getConfigFilePath(): string {
    return CONFIG_FILE;
}
