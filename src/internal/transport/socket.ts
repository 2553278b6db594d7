import net from 'net';
import { ErrorKind, TruncatedError } from '../../types/err';
import { NgError } from '../err';

/** One point-to-point connection to a single host. */
export interface Transport {
    open(): Promise<void>;
    isOpen(): boolean;
    close(): void;
    write(data: Buffer): Promise<void>;
    /**
     * Resolves once decode can parse a complete message from the bytes
     * received so far. decode returns the value and the bytes it consumed,
     * and throws TruncatedError while the message is incomplete.
     */
    read<T>(decode: (buf: Buffer) => [T, number]): Promise<T>;
}

// Quiet time after the last chunk before an incomplete message is parsed again.
const SETTLE_MS = 5;

export class SocketTransport implements Transport {
    private socket: net.Socket | null = null;
    private connected = false;
    // received bytes, joined only when a decode is attempted
    private chunks: Buffer[] = [];
    private buffered = 0;
    // size of the inbox at the last failed decode, and the size to try again at
    private triedAt = 0;
    private retryAt = 0;
    private wake: (() => void) | null = null;
    private failure: Error | null = null;

    // timeout bounds both the connect and each wait for reply bytes (ms)
    constructor(readonly host: string, readonly port: number, private readonly timeout: number) { }

    open(): Promise<void> {
        if (this.socket) return Promise.reject(NgError('transport already opened', ErrorKind.Client));

        return new Promise((resolve, reject) => {
            const socket = net.createConnection({ host: this.host, port: this.port });
            this.socket = socket;

            const timer = setTimeout(() => {
                socket.destroy();
                reject(NgError(`connect ${this.host}:${this.port} timed out after ${this.timeout}ms`, ErrorKind.Connection));
            }, this.timeout);

            socket.once('connect', () => {
                clearTimeout(timer);
                socket.removeListener('error', onConnectError);
                socket.setNoDelay(true);
                this.connected = true;
                this.attach(socket);
                resolve();
            });

            const onConnectError = (err: Error) => {
                clearTimeout(timer);
                socket.destroy();
                reject(NgError(err, ErrorKind.Connection));
            };
            socket.once('error', onConnectError);
        });
    }

    private attach(socket: net.Socket): void {
        socket.on('data', (chunk: Buffer) => {
            this.chunks.push(chunk);
            this.buffered += chunk.length;
            this.notify();
        });
        socket.on('error', (err) => {
            this.failure = err;
        });
        socket.on('close', () => {
            this.connected = false;
            this.notify();
        });
        socket.on('end', () => {
            // peer half-closed; nothing more will arrive
            this.connected = false;
            socket.destroy();
            this.notify();
        });
    }

    private notify(): void {
        const wake = this.wake;
        this.wake = null;
        wake?.();
    }

    isOpen(): boolean {
        return this.connected && this.socket !== null && !this.socket.destroyed;
    }

    close(): void {
        this.connected = false;
        this.socket?.destroy();
        this.notify();
    }

    write(data: Buffer): Promise<void> {
        const socket = this.socket;
        if (!socket || !this.isOpen()) return Promise.reject(NgError('connection closed', ErrorKind.Connection));

        return new Promise((resolve, reject) => {
            socket.write(data, (err) => {
                if (err) reject(NgError(err, ErrorKind.Connection));
                else resolve();
            });
        });
    }

    /**
     * An incomplete message is parsed again once the inbox has doubled and
     * holds the bytes the last attempt asked for, or once the peer has gone
     * quiet, so a reply split over many chunks is parsed a logarithmic number
     * of times.
     */
    async read<T>(decode: (buf: Buffer) => [T, number]): Promise<T> {
        let settled = false;
        for (; ;) {
            const fresh = this.buffered > this.triedAt;
            if (fresh && (settled || this.buffered >= this.retryAt || !this.isOpen())) {
                const inbox = this.drain();
                try {
                    const [value, used] = decode(inbox);
                    this.keep(inbox.subarray(used));
                    return value;
                } catch (err) {
                    if (!(err instanceof TruncatedError)) throw err;
                    this.triedAt = inbox.length;
                    this.retryAt = Math.max(err.needed, inbox.length * 2);
                }
            }
            if (!this.isOpen()) {
                const reason = this.failure ? `: ${this.failure.message}` : '';
                throw NgError(`connection closed${reason}`, ErrorKind.Connection);
            }
            settled = await this.waitForData();
        }
    }

    private drain(): Buffer {
        const inbox = this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks, this.buffered);
        this.chunks = [inbox];
        return inbox;
    }

    private keep(rest: Buffer): void {
        this.chunks = rest.length > 0 ? [rest] : [];
        this.buffered = rest.length;
        this.triedAt = 0;
        this.retryAt = 0;
    }

    // Resolves true when unparsed bytes have sat for SETTLE_MS, false on new data.
    private waitForData(): Promise<boolean> {
        return new Promise((resolve, reject) => {
            const timer = setTimeout(() => {
                this.wake = null;
                if (settle) clearTimeout(settle);
                reject(NgError(`no reply from ${this.host}:${this.port} within ${this.timeout}ms`, ErrorKind.Rpc));
            }, this.timeout);
            const settle = this.buffered > this.triedAt
                ? setTimeout(() => {
                    this.wake = null;
                    clearTimeout(timer);
                    resolve(true);
                }, SETTLE_MS)
                : null;
            this.wake = () => {
                clearTimeout(timer);
                if (settle) clearTimeout(settle);
                resolve(false);
            };
        });
    }
}
