// core/src/utils/debug.ts
// Console logger with level filtering, categories and an in-memory ring buffer

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'SYSTEM' | 'CRYPTO' | 'BLE' | 'CBOR';

export interface LogEntry {
    timestamp: Date;
    level: LogLevel;
    category?: string;
    message: string;
    data?: unknown;
}

export interface DebugConfig {
    enabled: boolean;
    minLevel: LogLevel;
    maxLogs: number;
    showTimestamp: boolean;
    showMilliseconds: boolean;
    useColors: boolean;
    persistLogs: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR', 'SYSTEM', 'CRYPTO', 'BLE', 'CBOR'];

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

export class DebugLogger {
    private static instance: DebugLogger;
    private config: DebugConfig;
    private logs: LogEntry[] = [];
    private startTime: number = Date.now();

    // ANSI colour codes
    private colors = {
        reset: '\x1b[0m',
        bright: '\x1b[1m',
        dim: '\x1b[2m',
        red: '\x1b[31m',
        green: '\x1b[32m',
        yellow: '\x1b[33m',
        blue: '\x1b[34m',
        magenta: '\x1b[35m',
        cyan: '\x1b[36m'
    };

    private levelConfig: Record<LogLevel, {
        color: string;
        priority: number;
        consoleMethod: 'log' | 'info' | 'warn' | 'error';
    }> = {
            DEBUG: { color: this.colors.dim, priority: 0, consoleMethod: 'log' },
            INFO: { color: this.colors.cyan, priority: 1, consoleMethod: 'info' },
            WARN: { color: this.colors.yellow, priority: 2, consoleMethod: 'warn' },
            ERROR: { color: this.colors.red, priority: 3, consoleMethod: 'error' },
            SYSTEM: { color: this.colors.magenta, priority: 1, consoleMethod: 'log' },
            CRYPTO: { color: this.colors.blue, priority: 1, consoleMethod: 'log' },
            BLE: { color: this.colors.cyan, priority: 1, consoleMethod: 'log' },
            CBOR: { color: this.colors.green, priority: 0, consoleMethod: 'log' }
        };

    private constructor() {
        this.config = {
            enabled: true,
            minLevel: 'INFO',
            maxLogs: 1000,
            showTimestamp: true,
            showMilliseconds: true,
            useColors: true,
            persistLogs: true
        };
    }

    static getInstance(): DebugLogger {
        if (!DebugLogger.instance) {
            DebugLogger.instance = new DebugLogger();
        }
        return DebugLogger.instance;
    }

    private formatTimestamp(): string {
        const now = new Date();
        const elapsed = Date.now() - this.startTime;
        const hours = now.getHours().toString().padStart(2, '0');
        const minutes = now.getMinutes().toString().padStart(2, '0');
        const seconds = now.getSeconds().toString().padStart(2, '0');

        let timestamp = `${hours}:${minutes}:${seconds}`;

        if (this.config.showMilliseconds) {
            const ms = now.getMilliseconds().toString().padStart(3, '0');
            timestamp += `.${ms}`;
        }

        const elapsedSec = Math.floor(elapsed / 1000);
        const elapsedMin = Math.floor(elapsedSec / 60);
        const elapsedDisplay = elapsedMin > 0
            ? `+${elapsedMin}m${(elapsedSec % 60)}s`
            : `+${elapsedSec}s`;

        return `${timestamp} ${elapsedDisplay}`;
    }

    private formatData(data: unknown): string {
        if (data instanceof Error) {
            return `\n  Error: ${data.message}\n  Stack: ${data.stack}`;
        }
        if (data instanceof Uint8Array) {
            return `\n  <${data.length} bytes>`;
        }
        if (typeof data === 'object') {
            try {
                return '\n' + JSON.stringify(data, (_key, value: unknown) =>
                    typeof value === 'bigint' ? value.toString() : value, 2)
                    .split('\n')
                    .map(line => '  ' + line)
                    .join('\n');
            } catch {
                return '\n  [Unserializable data]';
            }
        }
        return '\n  ' + String(data);
    }

    formatMessage(level: LogLevel, message: string, category?: string, data?: unknown): string {
        const levelCfg = this.levelConfig[level];
        const parts: string[] = [];

        if (this.config.showTimestamp) {
            parts.push(`[${this.formatTimestamp()}]`);
        }

        parts.push(`[${level}]`);

        if (category) {
            parts.push(`[${category}]`);
        }

        parts.push(message);

        let formatted = parts.join(' ');

        if (this.config.useColors) {
            formatted = levelCfg.color + formatted + this.colors.reset;
        }

        if (data !== undefined && data !== null) {
            let dataStr = this.formatData(data);
            if (this.config.useColors) {
                dataStr = this.colors.dim + dataStr + this.colors.reset;
            }
            formatted += dataStr;
        }

        return formatted;
    }

    private log(level: LogLevel, message: string, category?: string, data?: unknown): void {
        if (!this.config.enabled) return;

        const levelPriority = this.levelConfig[level].priority;
        const minPriority = this.levelConfig[this.config.minLevel].priority;
        if (levelPriority < minPriority) return;

        const entry: LogEntry = {
            timestamp: new Date(),
            level,
            category,
            message,
            data
        };

        if (this.config.persistLogs) {
            this.logs.push(entry);

            if (this.logs.length > this.config.maxLogs) {
                this.logs = this.logs.slice(-this.config.maxLogs);
            }
        }

        const formatted = this.formatMessage(level, message, category, data);
        const consoleMethod = this.levelConfig[level].consoleMethod;
        console[consoleMethod](formatted);
    }

    // Public logging methods
    public debug(message: string, data?: unknown): void {
        this.log('DEBUG', message, undefined, data);
    }

    public info(message: string, data?: unknown): void {
        this.log('INFO', message, undefined, data);
    }

    public warn(message: string, data?: unknown): void {
        this.log('WARN', message, undefined, data);
    }

    public error(message: string, error?: unknown): void {
        this.log('ERROR', message, undefined, error);
    }

    public system(message: string, data?: unknown): void {
        this.log('SYSTEM', message, undefined, data);
    }

    public crypto(message: string, data?: unknown): void {
        this.log('CRYPTO', message, undefined, data);
    }

    public ble(message: string, data?: unknown): void {
        this.log('BLE', message, undefined, data);
    }

    public cbor(message: string, data?: unknown): void {
        this.log('CBOR', message, undefined, data);
    }

    // Configuration
    public configure(config: Partial<DebugConfig>): void {
        this.config = { ...this.config, ...config };
    }

    /**
     * Apply MDOC_LOG / MDOC_LOG_LEVEL style settings, e.g. from process.env
     */
    public configureFromEnv(env: Record<string, string | undefined>): void {
        if (env.MDOC_LOG === 'off') {
            this.config.enabled = false;
        }
        const level = env.MDOC_LOG_LEVEL?.toUpperCase();
        if (level !== undefined && isLogLevel(level)) {
            this.config.minLevel = level;
        }
        if (env.NO_COLOR !== undefined) {
            this.config.useColors = false;
        }
    }

    public getConfig(): Readonly<DebugConfig> {
        return { ...this.config };
    }

    public setEnabled(enabled: boolean): void {
        this.config.enabled = enabled;
    }

    public setMinLevel(level: LogLevel): void {
        this.config.minLevel = level;
    }

    // Log management
    public getLogs(): LogEntry[] {
        return [...this.logs];
    }

    public clearLogs(): void {
        this.logs = [];
    }

    public exportLogs(): string {
        return this.logs.map(log => {
            const timestamp = log.timestamp.toISOString();
            const category = log.category ? ` [${log.category}]` : '';
            return `[${timestamp}] [${log.level}]${category} ${log.message}`;
        }).join('\n');
    }
}

// Singleton instance
export const debug = DebugLogger.getInstance();

// Transport debug helpers
export const debugBLE = {
    scan: (event: string, data?: unknown) => {
        debug.ble(`SCAN: ${event}`, data);
    },

    connection: (event: string, deviceId?: string, data?: unknown) => {
        const id = deviceId ? ` [${deviceId}]` : '';
        debug.ble(`CONNECTION: ${event}${id}`, data);
    },

    chunk: (direction: 'in' | 'out', chunk: Uint8Array) => {
        const marker = chunk.length > 0 ? chunk[0] : -1;
        debug.debug(`CHUNK ${direction}: ${chunk.length} bytes, marker ${marker}`);
    },

    discovery: (deviceId: string, rssi: number) => {
        debug.debug(`DISCOVERED: ${deviceId} ${rssi}dBm`);
    },

    error: (operation: string, error: unknown) => {
        debug.error(`BLE:${operation} failed`, error);
    }
};

// Crypto debug helpers; never pass key material here
export const debugCrypto = {
    keyGeneration: (curve: string) => {
        debug.crypto(`Ephemeral key pair generated on ${curve}`);
    },

    keysDerived: (role: string) => {
        debug.crypto(`Session keys derived for ${role}`);
    },

    error: (operation: string, error: unknown) => {
        debug.error(`CRYPTO:${operation} failed`, error);
    }
};

export type Debug = typeof debug;
export type DebugBLE = typeof debugBLE;
export type DebugCrypto = typeof debugCrypto;
