import type { Component } from '../manifest/manifest-types.js';

/** Types whose members are `Parent.Member`, split on the first dot. */
export const SPLITTABLE_BY_DOT: readonly string[] = [
  'AssignmentRule',
  'CustomField',
  'ListView',
  'RecordType',
  'SharingCriteriaRule',
  'SharingOwnerRule',
  'SharingTerritoryRule',
];

/** Types whose members are `Parent-Member`, split on the first hyphen. */
export const SPLITTABLE_BY_HYPHEN: readonly string[] = ['Layout'];

export interface ParentSplit {
  parent: string;
  member: string;
}

function separatorFor(typeName: string): string | undefined {
  if (SPLITTABLE_BY_DOT.includes(typeName)) return '.';
  if (SPLITTABLE_BY_HYPHEN.includes(typeName)) return '-';
  return undefined;
}

export function splitParent(component: Component): ParentSplit {
  const separator = separatorFor(component.typeName);
  const idx = separator === undefined ? -1 : component.memberName.indexOf(separator);
  if (idx === -1) {
    return { parent: '', member: component.memberName };
  }
  return {
    parent: component.memberName.slice(0, idx),
    member: component.memberName.slice(idx + 1),
  };
}
