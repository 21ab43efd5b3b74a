export enum FieldKind {
  Int = 'int',
  Uint = 'uint',
  /** Signed 64-bit integer bound as a `bigint`. */
  BigInt = 'bigint',
  /** Unsigned 64-bit integer bound as a `bigint`. */
  BigUint = 'biguint',
  /** Unsigned 8-bit scalar. As a sequence (`[FieldKind.Byte]`) it is the raw byte kind. */
  Byte = 'byte',
  Float = 'float',
  Bool = 'bool',
  String = 'string',
  /** Structured value. Not bindable from flat arguments. */
  Object = 'object',
}
