// Type definitions for compiled shader (OSO) declarations

/** Base types a declared OSO type reduces to */
export type BaseType =
  | 'unknown'
  | 'int' | 'float' | 'string'
  | 'point' | 'vector' | 'normal' | 'color' | 'matrix'
  | 'struct' | 'void';

/** Base types that may appear as a type keyword in a declaration */
export const BASE_TYPE_NAMES = [
  'int', 'float', 'string', 'point', 'vector', 'normal', 'color', 'matrix', 'struct', 'void',
] as const satisfies readonly BaseType[];

/** Component count per element; every type not listed here is a single scalar */
export const BASE_TYPE_COMPONENTS: Partial<Record<BaseType, number>> = {
  point: 3, vector: 3, normal: 3, color: 3, matrix: 16,
};

/** Fixed array length, or an unsized (variable-length) array */
export type ArraySize =
  | { kind: 'fixed'; length: number }
  | { kind: 'unsized' };

/** A fully resolved declared type */
export interface TypeDescriptor {
  base: BaseType;
  /** Array suffix, or null for a non-array type */
  arraySize: ArraySize | null;
  /** Closures are evaluated at shading time and never carry a default */
  isClosure: boolean;
  /** Struct name, for `struct` types where the file names it */
  structName?: string;
}

/** Decoded literal values, flattened across array elements and components */
export type ParameterValue =
  | { kind: 'int'; values: readonly number[] }
  | { kind: 'float'; values: readonly number[] }
  | { kind: 'string'; values: readonly string[] };

export type ScalarKind = ParameterValue['kind'];

/** A `%`-prefixed key/value annotation */
export interface Metadata {
  key: string;
  /** Always scalar: no array suffix, never a closure */
  type: TypeDescriptor;
  value: ParameterValue;
}

export type ParameterDirection = 'input' | 'output';

/** A shader parameter declared by a `param` or `oparam` line */
export interface Parameter {
  name: string;
  type: TypeDescriptor;
  direction: ParameterDirection;
  /** Absent for outputs, closures, and inputs declared without a default */
  default?: ParameterValue;
  /**
   * Element count: null for non-arrays, the declared length for fixed arrays,
   * the number of decoded elements for unsized arrays (0 without a default).
   */
  arrayLength: number | null;
  metadata: readonly Metadata[];
  /** Coordinate or colour space named by a `%space` hint */
  space?: string;
  /** Field names from a `%structfields` hint */
  structFields: readonly string[];
}

/** Everything declared ahead of the instruction section */
export interface ShaderRecord {
  name: string;
  /** e.g. "surface", "displacement", "shader" */
  shaderType: string;
  /** Raw version text from the `OpenShadingLanguage` marker, or null */
  version: string | null;
  parameters: readonly Parameter[];
  /** Hints attached to the shader itself */
  metadata: readonly Metadata[];
}

/** Options accepted by the OSO parser */
export interface ParseOptions {
  /** Reject files whose first declaration is not the version marker (default false) */
  requireVersion?: boolean;
}
