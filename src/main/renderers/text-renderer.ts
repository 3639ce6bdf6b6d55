// Plain-text rendering of a shader query, terse (one aligned row per
// parameter) or verbose (one block per parameter with its metadata).

import type { Metadata, Parameter, ParameterValue } from '../../shared/types/oso.js';
import { componentCount } from '../../shared/oso/type-parser.js';
import { formatType } from '../../shared/shader-query.js';
import type { ShaderQuery } from '../../shared/shader-query.js';

export interface TextRenderOptions {
  verbose?: boolean;
  /** Only render the parameter with this name */
  param?: string;
}

const NO_DEFAULT = '<no default>';

export function escapeString(s: string): string {
  return s
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t');
}

function formatScalars(value: ParameterValue): string[] {
  return value.kind === 'string'
    ? value.values.map(s => `"${escapeString(s)}"`)
    : value.values.map(n => String(n));
}

/** Group flat values into elements of `size` */
function chunk(items: readonly string[], size: number): string[][] {
  const groups: string[][] = [];
  for (let i = 0; i < items.length; i += size) groups.push(items.slice(i, i + size));
  return groups;
}

/**
 * Default value as shown to users: a bare scalar, `[x y z]` for aggregates,
 * `[[x y z] [x y z]]` for arrays of aggregates.
 */
export function formatDefault(param: Parameter): string {
  const value = param.default;
  if (value === undefined) return NO_DEFAULT;

  const scalars = formatScalars(value);
  const components = componentCount(param.type.base);
  const isArray = param.type.arraySize !== null;

  if (!isArray) {
    return components === 1 ? scalars.join(' ') : `[${scalars.join(' ')}]`;
  }
  if (components === 1) return `[${scalars.join(' ')}]`;
  return `[${chunk(scalars, components).map(group => `[${group.join(' ')}]`).join(' ')}]`;
}

/** `metadata: <type> <key> = <values>` */
export function formatMetadata(meta: Metadata): string {
  const values = formatScalars(meta.value);
  const type = values.length > 1 ? `${meta.type.base}[]` : meta.type.base;
  return `metadata: ${type} ${meta.key} = ${values.join(' ')}`;
}

function typeColumn(param: Parameter): string {
  const type = formatType(param.type);
  return param.direction === 'output' ? `output ${type}` : type;
}

function renderTerse(params: readonly Parameter[]): string[] {
  const nameWidth = Math.max(0, ...params.map(p => p.name.length));
  const typeWidth = Math.max(0, ...params.map(p => typeColumn(p).length));
  return params.map(p =>
    `${p.name.padEnd(nameWidth)} ${typeColumn(p).padEnd(typeWidth)}  ${formatDefault(p)}`);
}

function renderVerbose(params: readonly Parameter[]): string[] {
  const lines: string[] = [];
  for (const p of params) {
    lines.push(`    "${p.name}" "${typeColumn(p)}"`);
    lines.push(`\t\tDefault value: ${formatDefault(p)}`);
    if (p.space !== undefined) lines.push(`\t\tspace: ${p.space}`);
    if (p.structFields.length > 0) lines.push(`\t\tfields: ${p.structFields.join(', ')}`);
    for (const meta of p.metadata) lines.push(`\t\t${formatMetadata(meta)}`);
  }
  return lines;
}

/** Render the query as newline-terminated text */
export function renderText(query: ShaderQuery, options: TextRenderOptions = {}): string {
  const params = options.param === undefined
    ? query.params
    : query.params.filter(p => p.name === options.param);

  const lines = [`${query.shaderType} "${escapeString(query.shaderName)}"`];
  for (const meta of query.metadata) lines.push(`\t${formatMetadata(meta)}`);
  lines.push(...(options.verbose ? renderVerbose(params) : renderTerse(params)));
  return lines.join('\n') + '\n';
}
