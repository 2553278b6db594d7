// Records of the storage service's scan API.
import { defineStruct, fieldsOf, i32, binary } from '../codec';

export type ScanTag = {
    tagId?: number;
    key?: Buffer;
    value?: Buffer;
};

const st = fieldsOf<ScanTag>();
export const ScanTagCodec = defineStruct<ScanTag>('ScanTag', () => ({}), [
    st(1, 'tagId', i32),
    st(2, 'key', binary),
    st(3, 'value', binary),
]);
