import { NgqlError, ErrorKind } from '../types/err';
import { errorCodeName } from '../types/codes';

type Stringable = string | Error | { toString(): string };

// Node socket errno values that mean the peer could not be reached or went away.
const CONNECTION_ERRNOS = new Set([
    'ECONNREFUSED',
    'ECONNRESET',
    'ECONNABORTED',
    'ETIMEDOUT',
    'EPIPE',
    'EHOSTUNREACH',
    'ENETUNREACH',
    'ENOTFOUND',
    'EAI_AGAIN',
]);

/**
 * NgError turns *anything* into an NgqlError.
 *   NgError(new Error('connect ECONNREFUSED')) -> Connection (errno code)
 *   NgError('bad frame', ErrorKind.Decode)     -> forced bucket
 *   NgError(msg, ErrorKind.Query, -7)          -> code E_SYNTAX_ERROR, errorCode -7
 *   NgError('something else')                  -> Rpc
 */
export function NgError(input: Stringable, kind?: ErrorKind, errorCode?: number): NgqlError {
    if (input instanceof NgqlError) return input; // already wrapped

    const msg = input instanceof Error ? input.message : String(input);
    const code = errorCode !== undefined ? errorCodeName(errorCode) : defaultCode(kind);

    if (kind) return new NgqlError(kind, code, msg, errorCode);

    const errno = errnoOf(input);
    if (errno && CONNECTION_ERRNOS.has(errno)) {
        return new NgqlError(ErrorKind.Connection, errno, msg, errorCode);
    }
    return new NgqlError(ErrorKind.Rpc, errno ?? code, msg, errorCode);
}

function defaultCode(kind?: ErrorKind): string {
    switch (kind) {
        case ErrorKind.Client:
            return 'INVALID_ARGUMENT';
        case ErrorKind.Connection:
            return 'CONNECTION_ERROR';
        case ErrorKind.Query:
            return 'QUERY_ERROR';
        case ErrorKind.Decode:
            return 'DECODE_ERROR';
        default:
            return 'RPC_ERROR';
    }
}

function errnoOf(input: Stringable): string | undefined {
    if (!(input instanceof Error) || !('code' in input)) return undefined;
    return typeof input.code === 'string' ? input.code : undefined;
}
