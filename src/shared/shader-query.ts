// Read-only query model over a parsed shader

import type {
  Metadata, Parameter, ParseOptions, ShaderRecord, TypeDescriptor,
} from './types/oso.js';
import { IndexOutOfRangeError } from './oso/errors.js';
import { parseOso } from './oso/declaration-parser.js';

/** First metadata entry with the given key; duplicates stay reachable via `metadata` */
export function findMetadata(owner: { readonly metadata: readonly Metadata[] }, key: string): Metadata | undefined {
  return owner.metadata.find(m => m.key === key);
}

/** Declared spelling of a type, e.g. `color[3]`, `float[]`, `closure color` */
export function formatType(type: TypeDescriptor): string {
  let text: string = type.base;
  if (type.base === 'struct' && type.structName) text = `struct ${type.structName}`;
  if (type.isClosure) text = `closure ${text}`;
  if (type.arraySize) {
    text += type.arraySize.kind === 'fixed' ? `[${type.arraySize.length}]` : '[]';
  }
  return text;
}

export class ShaderQuery implements Iterable<Parameter> {
  private readonly _record: ShaderRecord;
  private readonly byName: ReadonlyMap<string, Parameter>;

  private constructor(record: ShaderRecord) {
    this._record = record;
    this.byName = new Map(record.parameters.map(p => [p.name, p]));
  }

  /** Parse OSO text or bytes. Throws OsoParseError on the first error. */
  static fromString(source: string | Uint8Array, options: ParseOptions = {}): ShaderQuery {
    return new ShaderQuery(parseOso(source, options));
  }

  static fromRecord(record: ShaderRecord): ShaderQuery {
    return new ShaderQuery(record);
  }

  get record(): ShaderRecord { return this._record; }
  get shaderName(): string { return this._record.name; }
  get shaderType(): string { return this._record.shaderType; }
  get version(): string | null { return this._record.version; }
  get paramCount(): number { return this._record.parameters.length; }
  get params(): readonly Parameter[] { return this._record.parameters; }
  /** Shader-level metadata */
  get metadata(): readonly Metadata[] { return this._record.metadata; }

  [Symbol.iterator](): Iterator<Parameter> {
    return this._record.parameters[Symbol.iterator]();
  }

  paramByName(name: string): Parameter | undefined {
    return this.byName.get(name);
  }

  paramAt(index: number): Parameter {
    const params = this._record.parameters;
    if (!Number.isInteger(index) || index < 0 || index >= params.length) {
      throw new IndexOutOfRangeError(index, params.length);
    }
    return params[index];
  }

  inputParams(): Parameter[] {
    return this._record.parameters.filter(p => p.direction === 'input');
  }

  outputParams(): Parameter[] {
    return this._record.parameters.filter(p => p.direction === 'output');
  }

  findMetadata(key: string): Metadata | undefined {
    return findMetadata(this._record, key);
  }

  /** True when the record names a shader and its type */
  isValid(): boolean {
    return this._record.name.length > 0 && this._record.shaderType.length > 0;
  }
}
