import { Mutex } from 'async-mutex';
import type { Transport } from '../transport/socket';
import type { StructCodec } from '../codec';
import { ErrorKind } from '../../types/err';
import { NgError } from '../err';
import { MessageType, encodeMessage, decodeMessage } from '../protocol/message';
import {
    AuthResponse,
    ExecutionResponse,
    AuthenticateArgsCodec,
    AuthenticateResultCodec,
    ExecuteArgsCodec,
    ExecuteResultCodec,
    SignoutArgsCodec,
} from '../schema/graph';

/**
 * Client stub for GraphService over one Transport. Calls are serialized, so
 * one request is in flight at a time and replies are matched in order.
 */
export class GraphServiceClient {
    private seqId = 0;
    private mu = new Mutex();

    constructor(private readonly transport: Transport) { }

    async authenticate(username: string, password: string): Promise<AuthResponse> {
        const result = await this.call('authenticate', AuthenticateArgsCodec, {
            username: Buffer.from(username, 'utf8'),
            password: Buffer.from(password, 'utf8'),
        }, AuthenticateResultCodec);
        if (!result.success) throw NgError('authenticate failed: unknown result', ErrorKind.Rpc);
        return result.success;
    }

    async execute(sessionId: bigint, stmt: string): Promise<ExecutionResponse> {
        const result = await this.call('execute', ExecuteArgsCodec, {
            sessionId,
            stmt: Buffer.from(stmt, 'utf8'),
        }, ExecuteResultCodec);
        if (!result.success) throw NgError('execute failed: unknown result', ErrorKind.Rpc);
        return result.success;
    }

    /** One-way: the server sends no reply. */
    async signout(sessionId: bigint): Promise<void> {
        await this.mu.runExclusive(async () => {
            const frame = encodeMessage('signout', MessageType.Oneway, this.nextSeqId(), SignoutArgsCodec, { sessionId });
            await this.transport.write(frame);
        });
    }

    private nextSeqId(): number {
        this.seqId = (this.seqId + 1) >>> 0;
        return this.seqId;
    }

    private call<A, R>(name: string, argsCodec: StructCodec<A>, args: A, resultCodec: StructCodec<R>): Promise<R> {
        return this.mu.runExclusive(async () => {
            const seqId = this.nextSeqId();
            await this.transport.write(encodeMessage(name, MessageType.Call, seqId, argsCodec, args));

            const msg = await this.transport.read((buf) => decodeMessage(buf, resultCodec));
            if (msg.type === MessageType.Exception) {
                const text = msg.exception.message?.toString('utf8') ?? 'unknown';
                throw NgError(`${name} raised: ${text}`, ErrorKind.Rpc);
            }
            if (msg.type !== MessageType.Reply) {
                throw NgError(`${name}: unexpected message type ${msg.type}`, ErrorKind.Rpc);
            }
            if (msg.name !== name) {
                throw NgError(`wrong method name in reply: got ${msg.name}, want ${name}`, ErrorKind.Rpc);
            }
            if (msg.seqId !== seqId) {
                throw NgError(`out of sequence reply: got ${msg.seqId}, want ${seqId}`, ErrorKind.Rpc);
            }
            return msg.body;
        });
    }
}
