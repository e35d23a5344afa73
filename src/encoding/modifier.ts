/**
 * Single-character qualifiers that prefix a type in an encoding
 * (method argument qualifiers plus `_Atomic` / `_Complex`).
 */
export type Modifier =
  | 'atomic'
  | 'complex'
  | 'const'
  | 'in'
  | 'inout'
  | 'out'
  | 'bycopy'
  | 'byref'
  | 'oneway'
  | 'register';

const modifierChars: Record<Modifier, string> = {
  atomic: 'A',
  complex: 'j',
  const: 'r',
  in: 'n',
  inout: 'N',
  out: 'o',
  bycopy: 'O',
  byref: 'R',
  oneway: 'V',
  register: '+',
};

const modifierKeywords: Record<Modifier, string> = {
  atomic: '_Atomic',
  complex: '_Complex',
  const: 'const',
  in: 'in',
  inout: 'inout',
  out: 'out',
  bycopy: 'bycopy',
  byref: 'byref',
  oneway: 'oneway',
  register: 'register',
};

export const MODIFIERS: readonly Modifier[] = [
  'atomic',
  'complex',
  'const',
  'in',
  'inout',
  'out',
  'bycopy',
  'byref',
  'oneway',
  'register',
];

const byChar = new Map<string, Modifier>(MODIFIERS.map((m) => [modifierChars[m], m]));

export function modifierFromChar(ch: string): Modifier | undefined {
  return byChar.get(ch);
}

export function isModifierChar(ch: string): boolean {
  return byChar.has(ch);
}

export function encodeModifier(m: Modifier): string {
  return modifierChars[m];
}

/** Declaration keyword, e.g. `const` or `_Atomic`. */
export function decodedModifier(m: Modifier): string {
  return modifierKeywords[m];
}
