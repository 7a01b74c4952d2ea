import type { SortPolicy } from '../schemas/view-options.schema.js';
import type { Component, ComponentList } from './manifest-types.js';

/** Compare by Unicode code point, so astral characters sort after the whole BMP. */
export function compareCodePoints(a: string, b: string): number {
  const left = a[Symbol.iterator]();
  const right = b[Symbol.iterator]();
  for (;;) {
    const l = left.next();
    const r = right.next();
    if (l.done === true || r.done === true) {
      if (l.done === true && r.done === true) return 0;
      return l.done === true ? -1 : 1;
    }
    const diff = (l.value.codePointAt(0) ?? 0) - (r.value.codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }
}

function compareByType(a: Component, b: Component): number {
  return compareCodePoints(a.typeName, b.typeName) || compareCodePoints(a.memberName, b.memberName);
}

/** Returns a new list; `Array.prototype.sort` is stable, so equal pairs keep their input order. */
export function sortComponents(list: ComponentList, policy: SortPolicy): Component[] {
  switch (policy) {
    case 'as-is':
      return [...list];
    case 'by-type':
      return [...list].sort(compareByType);
  }
}
