// JSON rendering of a shader query

import type { Metadata, Parameter, ParameterValue, ShaderRecord } from '../../shared/types/oso.js';
import { formatType } from '../../shared/shader-query.js';
import type { ShaderQuery } from '../../shared/shader-query.js';

export interface JsonValue {
  kind: ParameterValue['kind'];
  values: Array<number | string>;
}

export interface JsonMetadata {
  key: string;
  type: string;
  value: JsonValue;
}

export interface JsonParameter {
  name: string;
  /** Declared spelling, e.g. "color[2]" */
  type: string;
  direction: Parameter['direction'];
  arrayLength: number | null;
  isClosure: boolean;
  default: JsonValue | null;
  space?: string;
  structName?: string;
  structFields?: string[];
  metadata: JsonMetadata[];
}

export interface JsonShader {
  name: string;
  shaderType: string;
  version: string | null;
  metadata: JsonMetadata[];
  parameters: JsonParameter[];
}

function valueToJson(value: ParameterValue): JsonValue {
  return { kind: value.kind, values: [...value.values] };
}

function metadataToJson(meta: Metadata): JsonMetadata {
  return { key: meta.key, type: formatType(meta.type), value: valueToJson(meta.value) };
}

export function parameterToJson(param: Parameter): JsonParameter {
  const json: JsonParameter = {
    name: param.name,
    type: formatType(param.type),
    direction: param.direction,
    arrayLength: param.arrayLength,
    isClosure: param.type.isClosure,
    default: param.default ? valueToJson(param.default) : null,
    metadata: param.metadata.map(metadataToJson),
  };
  if (param.space !== undefined) json.space = param.space;
  if (param.type.structName !== undefined) json.structName = param.type.structName;
  if (param.structFields.length > 0) json.structFields = [...param.structFields];
  return json;
}

export function shaderToJson(record: ShaderRecord): JsonShader {
  return {
    name: record.name,
    shaderType: record.shaderType,
    version: record.version,
    metadata: record.metadata.map(metadataToJson),
    parameters: record.parameters.map(parameterToJson),
  };
}

/** Pretty-printed JSON of the whole shader, or of one parameter when given */
export function renderJson(query: ShaderQuery, param?: Parameter): string {
  const tree = param ? parameterToJson(param) : shaderToJson(query.record);
  return JSON.stringify(tree, null, 2) + '\n';
}
