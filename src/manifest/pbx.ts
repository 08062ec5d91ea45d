/**
 * OpenStep property list primitives
 *
 * The subset of the old-style plist grammar that project.pbxproj uses:
 * tab indentation, `key = value;` pairs, `( item, )` lists, `{ }` blocks
 * and `/* label *\/` comments after identifiers.
 */

export type PbxValue =
  | { kind: 'atom'; text: string }
  | { kind: 'list'; items: string[] }
  | { kind: 'dict'; fields: PbxField[] }

export type PbxField = [key: string, value: PbxValue]

const BARE_STRING = /^[A-Za-z0-9_./]+$/

/**
 * Compare by Unicode code point, independent of locale
 *
 * Differs from the default string comparison only where a surrogate pair
 * meets a code point in U+E000..U+FFFF.
 */
export function compareCodePoints(a: string, b: string): number {
  const left = a[Symbol.iterator]()
  const right = b[Symbol.iterator]()
  for (;;) {
    const l = left.next()
    const r = right.next()
    if (l.done || r.done) {
      return l.done === r.done ? 0 : l.done ? -1 : 1
    }
    const diff = (l.value.codePointAt(0) ?? 0) - (r.value.codePointAt(0) ?? 0)
    if (diff !== 0) {
      return diff < 0 ? -1 : 1
    }
  }
}

/**
 * Render a string scalar, quoting it unless it is a bare word
 *
 * @example
 * quote('sourcecode.swift') // sourcecode.swift
 * quote('Preview Content')  // "Preview Content"
 * quote('')                 // ""
 */
export function quote(value: string): string {
  if (BARE_STRING.test(value)) {
    return value
  }
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\t/g, '\\t')
  return `"${escaped}"`
}

/**
 * Render an identifier with its optional label comment
 */
export function reference(id: string, label?: string): string {
  if (label === undefined) {
    return id
  }
  return `${id} /* ${label.replace(/\*\//g, '*\\/')} */`
}

export function atom(text: string): PbxValue {
  return { kind: 'atom', text }
}

/** Quoted string scalar */
export function str(value: string): PbxValue {
  return atom(quote(value))
}

export function list(items: string[]): PbxValue {
  return { kind: 'list', items }
}

export function dict(fields: PbxField[]): PbxValue {
  return { kind: 'dict', fields }
}

/**
 * Render one field at the given tab depth
 */
export function renderField([key, value]: PbxField, depth: number): string[] {
  const indent = '\t'.repeat(depth)
  switch (value.kind) {
    case 'atom':
      return [`${indent}${key} = ${value.text};`]
    case 'list':
      return [`${indent}${key} = (`, ...value.items.map((item) => `${indent}\t${item},`), `${indent});`]
    case 'dict':
      return [
        `${indent}${key} = {`,
        ...value.fields.flatMap((field) => renderField(field, depth + 1)),
        `${indent}};`,
      ]
  }
}

/**
 * Render an object entry over several lines
 *
 * @param header - Identifier and label, e.g. `reference(id, 'Products')`
 */
export function renderObject(header: string, fields: PbxField[], depth = 2): string[] {
  return renderField([header, dict(fields)], depth)
}

/**
 * Render an object entry on a single line
 *
 * Used for PBXBuildFile and PBXFileReference, which Xcode keeps compact.
 */
export function renderInlineObject(header: string, fields: Array<[key: string, text: string]>, depth = 2): string {
  const body = fields.map(([key, text]) => `${key} = ${text}; `).join('')
  return `${'\t'.repeat(depth)}${header} = {${body}};`
}
