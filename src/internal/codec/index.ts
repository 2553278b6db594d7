export { CType, CompactReader, CompactWriter, PROTOCOL_VERSION } from './compact';
export { Hasher, bool, byte, i16, i32, i64, float, double, binary, list, formatHex } from './types';
export type { TypeDesc } from './types';
export { defineStruct, fieldsOf } from './struct';
export type { FieldDef, FieldOptions, StructCodec, StructOptions } from './struct';
