export interface ParameterDoc {
  name: string;
  doc: string;
}

export interface FunctionDoc {
  name: string;
  // full signature as shown in hover and signature help
  label: string;
  doc: string;
  parameters: ParameterDoc[];
}

export interface TypeDoc {
  name: string;
  doc: string;
}

function fn(label: string, doc: string, ...parameters: Array<[string, string]>): FunctionDoc {
  return {
    name: label.slice(0, label.indexOf('(')),
    label,
    doc,
    parameters: parameters.map(([name, pdoc]) => ({ name, doc: pdoc })),
  };
}

// The functions the migration rules rewrite into, plus a few common ones
export const FUNCTIONS: readonly FunctionDoc[] = [
  fn('cast(value: any, type: type) -> any', 'Cast value to type', ['value', 'Value to cast'], ['type', 'Target type']),
  fn('coalesce(value: any, ...) -> any', 'Return first non-null value', ['value', 'Values to check']),
  fn('grep(pattern: string|regexp, value: any) -> bool', 'Search for pattern', ['pattern', 'Search pattern'], ['value', 'Value to search']),
  fn('has(record: record, field: string) -> bool', 'Check if field exists', ['record', 'Record to check'], ['field', 'Field name']),
  fn('is(value: any, type: type) -> bool', 'Check if value is type', ['value', 'Value to check'], ['type', 'Type to check against']),
  fn('join(array: [string], sep: string) -> string', 'Join strings with separator', ['array', 'Array of strings'], ['sep', 'Separator']),
  fn('len(value: string|bytes|array) -> int64', 'Get length', ['value', 'Value to measure']),
  fn('lower(value: string) -> string', 'Convert to lowercase', ['value', 'String to convert']),
  fn('nest_dotted(record: record) -> record', 'Nest dotted field names', ['record', 'Record with dotted names']),
  fn('now() -> time', 'Current timestamp'),
  fn('parse_sup(value: string) -> any', 'Parse a serialized value', ['value', 'String to parse']),
  fn('upper(value: string) -> string', 'Convert to uppercase', ['value', 'String to convert']),
];

export const TYPES: readonly TypeDoc[] = [
  { name: 'int64', doc: '64-bit signed integer' },
  { name: 'uint64', doc: '64-bit unsigned integer' },
  { name: 'float64', doc: '64-bit floating point' },
  { name: 'bool', doc: 'Boolean' },
  { name: 'string', doc: 'UTF-8 string' },
  { name: 'bytes', doc: 'Byte sequence' },
  { name: 'time', doc: 'Timestamp' },
  { name: 'duration', doc: 'Time duration' },
  { name: 'ip', doc: 'IP address' },
  { name: 'net', doc: 'CIDR network' },
  { name: 'type', doc: 'Type value' },
  { name: 'error', doc: 'Error value' },
  { name: 'null', doc: 'Null value' },
];

export function lookupFunction(name: string): FunctionDoc | undefined {
  const lower = name.toLowerCase();
  return FUNCTIONS.find((f) => f.name === lower);
}

export function lookupType(name: string): TypeDoc | undefined {
  const lower = name.toLowerCase();
  return TYPES.find((t) => t.name === lower);
}
