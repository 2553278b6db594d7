export enum ErrorKind {
    Client = 'CLIENT',
    Connection = 'CONNECTION',
    Query = 'QUERY',
    Rpc = 'RPC',
    Decode = 'DECODE',
}

export class NgqlError extends Error {
    public readonly kind: ErrorKind;
    public readonly code: string;
    // numeric ErrorCode, set for server replies and client-side E_* outcomes
    public readonly errorCode?: number;

    constructor(kind: ErrorKind, code: string, message: string, errorCode?: number) {
        super(`${code}:${message}`);
        this.name = 'NgqlError';
        this.kind = kind;
        this.code = code;
        this.errorCode = errorCode;
        Object.setPrototypeOf(this, new.target.prototype); // instanceof works for subclasses too
    }

    static readonly Client = new NgqlError(ErrorKind.Client, 'CLIENT_ERROR', '');
    static readonly Connection = new NgqlError(ErrorKind.Connection, 'CONNECTION_ERROR', '');
    static readonly Query = new NgqlError(ErrorKind.Query, 'QUERY_ERROR', '');
    static readonly Rpc = new NgqlError(ErrorKind.Rpc, 'RPC_ERROR', '');
    static readonly Decode = new NgqlError(ErrorKind.Decode, 'DECODE_ERROR', '');
}

/**
 * Raised by the reader when the input ends before a complete value. `needed`
 * is the input length the reader would have needed to get past that point.
 */
export class TruncatedError extends NgqlError {
    constructor(message: string, readonly needed: number) {
        super(ErrorKind.Decode, 'TRUNCATED', message);
        this.name = 'TruncatedError';
    }
}

/* ---------- user-facing helpers ---------- */
export const IsClient = (e: unknown): e is NgqlError => isKind(e, ErrorKind.Client);
export const IsConnection = (e: unknown): e is NgqlError => isKind(e, ErrorKind.Connection);
export const IsQuery = (e: unknown): e is NgqlError => isKind(e, ErrorKind.Query);
export const IsRpc = (e: unknown): e is NgqlError => isKind(e, ErrorKind.Rpc);
export const IsDecode = (e: unknown): e is NgqlError => isKind(e, ErrorKind.Decode);

function isKind(err: unknown, want: ErrorKind): boolean {
    return err instanceof NgqlError && err.kind === want;
}
