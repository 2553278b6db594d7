// Error codes shared with the graph daemon. 0 is the only success value;
// the first three are produced on the client side.
export const ErrorCode = {
    SUCCEEDED: 0,
    E_DISCONNECTED: -1,
    E_FAIL_TO_CONNECT: -2,
    E_RPC_FAILURE: -3,
    E_BAD_USERNAME_PASSWORD: -4,
    E_SESSION_INVALID: -5,
    E_SESSION_TIMEOUT: -6,
    E_SYNTAX_ERROR: -7,
    E_EXECUTION_ERROR: -8,
    E_STATEMENT_EMPTY: -9,
    E_USER_NOT_FOUND: -10,
    E_BAD_PERMISSION: -11,
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

const names = new Map<number, string>(Object.entries(ErrorCode).map(([name, code]) => [code, name]));

/** Symbolic name of a code, or `E_UNKNOWN(<code>)` for codes this client does not know. */
export function errorCodeName(code: number): string {
    return names.get(code) ?? `E_UNKNOWN(${code})`;
}
