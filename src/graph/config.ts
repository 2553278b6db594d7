// src/graph/config.ts
import net from 'net';
import { NgError } from '../internal/err';
import { ErrorKind } from '../types/err';

export type HostAddress = {
    readonly host: string;
    readonly port: number;
};

export type Logger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export const DEFAULT_TIMEOUT_MS = 1_000;
export const DEFAULT_CONNECTION_RETRY = 3;
export const DEFAULT_EXECUTION_RETRY = 3;
export const DEFAULT_BACKOFF_MS = 100;
export const DEFAULT_POOL_SIZE = 16;

export class Config {
    addresses: HostAddress[] = [];
    timeout = DEFAULT_TIMEOUT_MS; // ms, connect and per-reply wait
    connectionRetry = DEFAULT_CONNECTION_RETRY;
    executionRetry = DEFAULT_EXECUTION_RETRY;
    backoff = DEFAULT_BACKOFF_MS; // ms, base of the exponential retry delay
    poolSize = DEFAULT_POOL_SIZE;
    logger: Logger = console;
}

const HOST_LABEL = /^[a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?$/;

/** IP literal or RFC 1123 host name. */
export function isValidHost(host: string): boolean {
    if (net.isIP(host) !== 0) return true;
    if (host.length === 0 || host.length > 253) return false;
    return host.split('.').every((label) => HOST_LABEL.test(label));
}

export function isValidPort(port: number): boolean {
    return Number.isInteger(port) && port > 0 && port < 65535;
}

/** Parses "host:port" or "[v6]:port". */
export function parseAddress(s: string): HostAddress {
    const text = s.trim();
    let host: string;
    let portText: string;
    if (text.startsWith('[')) {
        const end = text.indexOf(']');
        host = text.slice(1, end);
        portText = end >= 0 && text[end + 1] === ':' ? text.slice(end + 2) : '';
    } else {
        const idx = text.lastIndexOf(':');
        host = idx >= 0 ? text.slice(0, idx) : text;
        portText = idx >= 0 ? text.slice(idx + 1) : '';
    }
    const port = /^\d+$/.test(portText) ? Number(portText) : NaN;
    return { host, port };
}

/** Checks every setting and reports all problems at once. */
export function verifyConfig(cfg: Config): [boolean, string] {
    const errors: string[] = [];

    if (cfg.addresses.length === 0) {
        errors.push('at least one address is required');
    }
    for (const { host, port } of cfg.addresses) {
        if (!isValidHost(host) || !isValidPort(port)) {
            errors.push(`${host}:${port} is not a valid address`);
        }
    }
    if (!(cfg.timeout > 0)) errors.push('timeout must be > 0');
    if (!Number.isInteger(cfg.connectionRetry) || cfg.connectionRetry <= 0) {
        errors.push('connection retry must be a positive integer');
    }
    if (!Number.isInteger(cfg.executionRetry) || cfg.executionRetry <= 0) {
        errors.push('execution retry must be a positive integer');
    }
    if (!(cfg.backoff >= 0)) errors.push('backoff must be >= 0');
    if (!Number.isInteger(cfg.poolSize) || cfg.poolSize <= 0) {
        errors.push('pool size must be a positive integer');
    }

    if (errors.length > 0) {
        return [false, `Config validation failed:\n  - ${errors.join('\n  - ')}`];
    }
    return [true, ''];
}

export class ConfigBuilder {
    private config = new Config();

    private constructor() { }

    /** Create a new builder with sensible defaults */
    static new(): ConfigBuilder {
        return new ConfigBuilder();
    }

    withAddress(host: string, port: number): this {
        this.config.addresses.push({ host: host.trim(), port });
        return this;
    }

    /** Comma-separated "host:port" list. */
    withAddresses(list: string): this {
        for (const part of list.split(',')) {
            if (part.trim() === '') continue;
            this.config.addresses.push(parseAddress(part));
        }
        return this;
    }

    withTimeout(timeoutMs: number): this {
        this.config.timeout = timeoutMs;
        return this;
    }

    withConnectionRetry(n: number): this {
        this.config.connectionRetry = n;
        return this;
    }

    withExecutionRetry(n: number): this {
        this.config.executionRetry = n;
        return this;
    }

    withBackoff(ms: number): this {
        this.config.backoff = ms;
        return this;
    }

    withPoolSize(n: number): this {
        this.config.poolSize = n;
        return this;
    }

    withLogger(logger: Logger): this {
        this.config.logger = logger;
        return this;
    }

    /** Build and validate the config */
    build(): Config {
        const [valid, errMsg] = verifyConfig(this.config);
        if (!valid) throw NgError(errMsg, ErrorKind.Client);

        const addresses = this.config.addresses.map((a) => Object.freeze({ ...a }));
        return Object.freeze({ ...this.config, addresses });
    }
}
