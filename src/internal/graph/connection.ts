// src/internal/graph/connection.ts
import type { Config, HostAddress } from '../../graph/config';
import { ErrorCode } from '../../types/codes';
import { ErrorKind, NgqlError } from '../../types/err';
import { NgError } from '../err';
import { withRetries } from '../retry';
import { GraphServiceClient } from '../service/graph';
import { SocketTransport, Transport } from '../transport/socket';

export type TransportFactory = (address: HostAddress, timeoutMs: number) => Transport;

export const socketTransport: TransportFactory = (address, timeoutMs) =>
    new SocketTransport(address.host, address.port, timeoutMs);

export interface Session {
    readonly id: bigint;
    readonly address: HostAddress;
    readonly transport: Transport;
    readonly service: GraphServiceClient;
}

function isBadCredentials(err: unknown): boolean {
    return err instanceof NgqlError && err.errorCode === ErrorCode.E_BAD_USERNAME_PASSWORD;
}

/**
 * Owns the Transport and the session on it. connect() tries random hosts
 * until one authenticates or the attempt budget runs out.
 */
export class ConnectionManager {
    private session: Session | null = null;

    constructor(
        private readonly cfg: Config,
        private readonly newTransport: TransportFactory = socketTransport,
        private readonly pick: (n: number) => number = (n) => Math.floor(Math.random() * n),
    ) { }

    async connect(username: string, password: string): Promise<ErrorCode> {
        const log = this.cfg.logger;
        this.drop();

        let session: Session;
        try {
            session = await withRetries({
                maxAttempts: this.cfg.connectionRetry,
                backoffMs: this.cfg.backoff,
                isRetryable: (err) => !isBadCredentials(err),
                onRetry: (err, attempt, delay) => {
                    const msg = err instanceof Error ? err.message : String(err);
                    log.warn(`[graph] connect attempt ${attempt} failed: ${msg}; retrying in ${delay}ms`);
                },
            }, () => this.attempt(username, password));
        } catch (err) {
            if (isBadCredentials(err)) {
                log.error('[graph] user name or password error');
                return ErrorCode.E_BAD_USERNAME_PASSWORD;
            }
            const msg = err instanceof Error ? err.message : String(err);
            log.error(`[graph] connect failed after ${this.cfg.connectionRetry} attempt(s): ${msg}`);
            return ErrorCode.E_FAIL_TO_CONNECT;
        }

        this.session = session;
        log.info(`[graph] connected to ${session.address.host}:${session.address.port}`);
        return ErrorCode.SUCCEEDED;
    }

    private async attempt(username: string, password: string): Promise<Session> {
        const address = this.cfg.addresses[this.pick(this.cfg.addresses.length)];
        const transport = this.newTransport(address, this.cfg.timeout);

        try {
            await transport.open();
            const service = new GraphServiceClient(transport);
            const resp = await service.authenticate(username, password);
            const code = resp.errorCode ?? ErrorCode.E_RPC_FAILURE;

            if (code === ErrorCode.E_BAD_USERNAME_PASSWORD) {
                throw NgError('bad user name or password', ErrorKind.Connection, code);
            }
            if (code !== ErrorCode.SUCCEEDED) {
                const msg = resp.errorMsg?.toString('utf8') ?? '';
                throw NgError(`connect ${address.host}:${address.port} failed: ${msg}`, ErrorKind.Connection, code);
            }
            if (resp.sessionId === undefined) {
                throw NgError(`connect ${address.host}:${address.port}: no session id in reply`, ErrorKind.Rpc);
            }
            return { id: resp.sessionId, address, transport, service };
        } catch (err) {
            transport.close();
            throw NgError(err instanceof Error ? err : String(err));
        }
    }

    /** The live session, or null when never connected or the Transport is gone. */
    current(): Session | null {
        if (this.session && !this.session.transport.isOpen()) {
            this.cfg.logger.warn('[graph] transport closed, session dropped');
            this.session = null;
        }
        return this.session;
    }

    /** Forgets the session and closes its Transport without signing out. */
    drop(): void {
        this.session?.transport.close();
        this.session = null;
    }

    /** Signs out (best effort) and closes the Transport. Safe to call twice. */
    async close(): Promise<void> {
        const session = this.current();
        this.session = null;
        if (!session) return;

        try {
            await session.service.signout(session.id);
        } catch (err) {
            const msg = err instanceof Error ? err.message : String(err);
            this.cfg.logger.warn(`[graph] signout failed: ${msg}`);
        } finally {
            session.transport.close();
        }
    }
}
