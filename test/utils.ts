import { ConfigBuilder } from '../src/graph/config';
import type { Config, HostAddress, Logger } from '../src/graph/config';
import type { TransportFactory } from '../src/internal/graph/connection';
import type { Transport } from '../src/internal/transport/socket';
import { CompactReader } from '../src/internal/codec';
import { MessageType, encodeMessage, readMessageHeader } from '../src/internal/protocol/message';
import {
    AuthResponse,
    ExecutionResponse,
    AuthenticateArgsCodec,
    AuthenticateResultCodec,
    ExecuteArgsCodec,
    ExecuteResultCodec,
    SignoutArgsCodec,
} from '../src/internal/schema/graph';
import { NgError } from '../src/internal/err';
import { ErrorKind } from '../src/types/err';

// ─────────────────────────────────────────────────────────────────────────────
// Tiny utilities
// ─────────────────────────────────────────────────────────────────────────────
export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

export function testLogger(): { lines: string[]; logger: Logger } {
    const lines: string[] = [];
    const push = (...args: unknown[]): void => {
        lines.push(args.map(String).join(' '));
    };
    return { lines, logger: { debug: push, info: push, warn: push, error: push } };
}

export const ADDRESSES: HostAddress[] = [
    { host: '10.0.0.1', port: 3699 },
    { host: '10.0.0.2', port: 3699 },
    { host: '10.0.0.3', port: 3699 },
];

export function testConfig(logger: Logger, edit: (b: ConfigBuilder) => ConfigBuilder = (b) => b): Config {
    let b = ConfigBuilder.new().withBackoff(0).withLogger(logger);
    for (const a of ADDRESSES) b = b.withAddress(a.host, a.port);
    return edit(b).build();
}

// ─────────────────────────────────────────────────────────────────────────────
// In-process graph daemon: decodes calls, answers them through the hooks
// ─────────────────────────────────────────────────────────────────────────────
export const SESSION_ID = 42n;

export class FakeGraphServer {
    readonly opened: HostAddress[] = [];
    readonly transports: FakeTransport[] = [];
    readonly logins: Array<{ username: string; password: string }> = [];
    readonly statements: string[] = [];
    readonly signouts: bigint[] = [];
    writes = 0;

    refuse: (address: HostAddress, attempt: number) => boolean = () => false;
    onAuthenticate: (username: string, password: string) => AuthResponse = () => ({ errorCode: 0, sessionId: SESSION_ID });
    // 'drop' swallows the call: the client sees no reply
    onExecute: (stmt: string, sessionId: bigint) => ExecutionResponse | 'drop' = () => ({ errorCode: 0 });

    readonly factory: TransportFactory = (address) => {
        const t = new FakeTransport(this, address);
        this.transports.push(t);
        return t;
    };

    /**
     * Handles one call from the front of buf. Returns the reply (null for
     * one-way calls and dropped ones) and the bytes the call took.
     */
    handle(buf: Buffer): [Buffer | null, number] {
        const r = new CompactReader(buf);
        const header = readMessageHeader(r);

        switch (header.name) {
            case 'authenticate': {
                const args = AuthenticateArgsCodec.read(r);
                const username = args.username?.toString('utf8') ?? '';
                const password = args.password?.toString('utf8') ?? '';
                this.logins.push({ username, password });
                const success = this.onAuthenticate(username, password);
                return [encodeMessage('authenticate', MessageType.Reply, header.seqId, AuthenticateResultCodec, { success }), r.offset];
            }
            case 'execute': {
                const args = ExecuteArgsCodec.read(r);
                const stmt = args.stmt?.toString('utf8') ?? '';
                this.statements.push(stmt);
                const success = this.onExecute(stmt, args.sessionId ?? -1n);
                if (success === 'drop') return [null, r.offset];
                return [encodeMessage('execute', MessageType.Reply, header.seqId, ExecuteResultCodec, { success }), r.offset];
            }
            case 'signout': {
                const args = SignoutArgsCodec.read(r);
                this.signouts.push(args.sessionId ?? -1n);
                return [null, r.offset];
            }
            default:
                throw new Error(`unexpected call ${header.name}`);
        }
    }
}

export class FakeTransport implements Transport {
    private state: 'new' | 'open' | 'closed' = 'new';
    private replies: Buffer[] = [];

    constructor(private readonly server: FakeGraphServer, readonly address: HostAddress) { }

    async open(): Promise<void> {
        this.server.opened.push(this.address);
        if (this.server.refuse(this.address, this.server.opened.length)) {
            this.state = 'closed';
            throw NgError(`connect ECONNREFUSED ${this.address.host}:${this.address.port}`, ErrorKind.Connection);
        }
        this.state = 'open';
    }

    isOpen(): boolean {
        return this.state === 'open';
    }

    close(): void {
        this.state = 'closed';
    }

    async write(data: Buffer): Promise<void> {
        if (!this.isOpen()) throw NgError('connection closed', ErrorKind.Connection);
        this.server.writes++;
        const [reply] = this.server.handle(data);
        if (reply) this.replies.push(reply);
    }

    async read<T>(decode: (buf: Buffer) => [T, number]): Promise<T> {
        const next = this.replies.shift();
        if (next) return decode(next)[0];
        if (!this.isOpen()) throw NgError('connection closed', ErrorKind.Connection);
        throw NgError(`no reply from ${this.address.host}:${this.address.port}`, ErrorKind.Rpc);
    }
}

/** Transport that plays back canned reply bytes and records what was written. */
export class ScriptedTransport implements Transport {
    readonly written: Buffer[] = [];
    private opened = false;

    constructor(private readonly replies: Buffer[]) { }

    async open(): Promise<void> {
        this.opened = true;
    }

    isOpen(): boolean {
        return this.opened;
    }

    close(): void {
        this.opened = false;
    }

    async write(data: Buffer): Promise<void> {
        this.written.push(data);
    }

    async read<T>(decode: (buf: Buffer) => [T, number]): Promise<T> {
        const next = this.replies.shift();
        if (!next) throw NgError('no reply', ErrorKind.Rpc);
        return decode(next)[0];
    }
}
