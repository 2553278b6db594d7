import { ErrorKind } from '../../types/err';
import { NgError } from '../err';
import { CompactReader, CompactWriter, PROTOCOL_VERSION, defineStruct, fieldsOf, binary, i32 } from '../codec';
import type { StructCodec } from '../codec';

// Envelope layout:
// | 0x82 | version(5 bits) type(3 bits) | seqId(varint) | name(binary) | record |
const PROTOCOL_ID = 0x82;
const VERSION_MASK = 0x1f;
const TYPE_SHIFT = 5;

export enum MessageType {
    Call = 1,
    Reply = 2,
    Exception = 3,
    Oneway = 4,
}

export type ApplicationException = {
    message?: Buffer;
    type?: number;
};

const ae = fieldsOf<ApplicationException>();
export const ApplicationExceptionCodec = defineStruct<ApplicationException>('ApplicationException', () => ({}), [
    ae(1, 'message', binary),
    ae(2, 'type', i32),
]);

export type MessageHeader = {
    name: string;
    type: MessageType;
    seqId: number;
    version: number;
};

export type Message<T> =
    | (MessageHeader & { type: MessageType.Call | MessageType.Reply | MessageType.Oneway; body: T })
    | (MessageHeader & { type: MessageType.Exception; exception: ApplicationException });

export function encodeMessage<T>(name: string, type: MessageType, seqId: number, codec: StructCodec<T>, body: T): Buffer {
    const w = new CompactWriter();
    w.writeUByte(PROTOCOL_ID);
    w.writeUByte((PROTOCOL_VERSION & VERSION_MASK) | (type << TYPE_SHIFT));
    w.writeVarint32(seqId);
    w.writeString(name);
    codec.write(w, body);
    return w.finish();
}

export function readMessageHeader(r: CompactReader): MessageHeader {
    const id = r.readUByte();
    if (id !== PROTOCOL_ID) {
        throw NgError(`bad protocol id: got 0x${id.toString(16).padStart(2, '0')}`, ErrorKind.Decode);
    }
    const b = r.readUByte();
    const version = b & VERSION_MASK;
    if (version < 1 || version > PROTOCOL_VERSION) {
        throw NgError(`unsupported protocol version ${version}`, ErrorKind.Decode);
    }
    const type = (b >> TYPE_SHIFT) & 0x07;
    if (type < MessageType.Call || type > MessageType.Oneway) {
        throw NgError(`bad message type ${type}`, ErrorKind.Decode);
    }
    r.version = version;
    const seqId = r.readVarint32();
    const name = r.readString();
    return { name, type, seqId, version };
}

/**
 * Decodes one message from the front of buf and reports how many bytes it
 * took. Throws TruncatedError while buf does not yet hold the whole message.
 */
export function decodeMessage<T>(buf: Buffer, codec: StructCodec<T>): [Message<T>, number] {
    const r = new CompactReader(buf);
    const header = readMessageHeader(r);
    if (header.type === MessageType.Exception) {
        const exception = ApplicationExceptionCodec.read(r);
        return [{ ...header, type: MessageType.Exception, exception }, r.offset];
    }
    const body = codec.read(r);
    return [{ ...header, type: header.type, body }, r.offset];
}
