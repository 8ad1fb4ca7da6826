import * as t from '@babel/types';
import type { FunctionDescriptor, SurfaceKind } from '@opbind/types';

export interface DocParam {
  /** Binding name, or `args.<key>` for an interop argument object */
  name: string;
  description: string;
  defaultValue?: string;
}

/** Docs for the parameters a surface appends to every typed callable */
export const TRAILING_PARAM_DOCS: Record<SurfaceKind, DocParam[]> = {
  graph: [
    { name: 'name', description: 'Name of the resulting symbol' },
    { name: 'attr', description: 'Attributes attached to the resulting symbol' },
  ],
  eager: [{ name: 'out', description: 'Output array to write the result into' }],
  interop: [],
};

const RETURNS: Record<SurfaceKind, string> = {
  graph: 'The resulting symbol',
  eager: 'The resulting arrays',
  interop: 'The output arrays',
};

function sanitize(text: string): string {
  return text.replace(/\*\//g, '*\\/').replace(/\r\n?/g, '\n');
}

/**
 * JSDoc body for a generated callable, one string with `\n` separators
 * and no comment delimiters.
 */
export function buildDocComment(
  descriptor: FunctionDescriptor,
  surface: SurfaceKind,
  params: DocParam[],
  trailing: DocParam[] = TRAILING_PARAM_DOCS[surface]
): string {
  const lines: string[] = [];

  const description = sanitize(descriptor.description).trim();
  if (description.length > 0) {
    lines.push(...description.split('\n').map(l => l.trimEnd()));
    lines.push('');
  }

  for (const param of [...params, ...trailing]) {
    let line = `@param ${param.name}`;
    const text = sanitize(param.description).replace(/\s*\n\s*/g, ' ').trim();
    if (text.length > 0) line += ` ${text}`;
    if (param.defaultValue !== undefined) line += ` (default: ${sanitize(param.defaultValue)})`;
    lines.push(line);
  }
  lines.push(`@returns ${RETURNS[surface]}`);

  return lines.join('\n');
}

/**
 * Attach `doc` as a leading `/** ... *\/` block comment.
 */
export function attachDocComment(node: t.Node, doc: string | null): void {
  if (doc === null) return;
  const body = doc
    .split('\n')
    .map(line => (line.length > 0 ? ` * ${line}` : ' *'))
    .join('\n');
  t.addComment(node, 'leading', `*\n${body}\n `, false);
}
