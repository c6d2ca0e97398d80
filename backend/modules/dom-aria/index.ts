import { readFileSync } from 'node:fs';
import { defineRule, plural } from '../../core/rule.js';
import { CatalogueError } from '../../core/errors.js';
import type { DomElement } from '../../src/dom/document.js';

function loadRoles(): ReadonlySet<string> {
  const file = new URL('../../config/aria-roles.json', import.meta.url);
  const data: unknown = JSON.parse(readFileSync(file, 'utf-8'));
  if (typeof data !== 'object' || data === null || !('roles' in data) || !Array.isArray(data.roles)) {
    throw new CatalogueError('aria-roles.json must contain a "roles" array');
  }
  const list: unknown[] = data.roles;
  const roles = new Set<string>();
  for (const r of list) {
    if (typeof r !== 'string') throw new CatalogueError(`aria-roles.json: role ${JSON.stringify(r)} is not a string`);
    roles.add(r.toLowerCase());
  }
  return roles;
}

export const VALID_ROLES = loadRoles();

const mod = defineRule(
  'dom-aria',
  { ruleCode: 'ARIA_ROLE_INVALID', wcagReference: '4.1.2', wcagLevel: 'AA', principle: 'Robust' },
  (doc, finding) => {
    const withRole = doc.elementsWithAttribute('role');
    const invalid: { role: string; el: DomElement }[] = [];

    for (const el of withRole) {
      const role = (el.attr('role') ?? '').trim().toLowerCase();
      if (role && !VALID_ROLES.has(role)) invalid.push({ role, el });
    }

    if (invalid.length) {
      const names = invalid
        .slice(0, 5)
        .map((r) => `'${r.role}'`)
        .join(', ');
      return [
        finding({
          severity: 'fail',
          message: `${plural(invalid.length, 'invalid ARIA role')} found: ${names}`,
          remediation: 'Use only valid ARIA 1.2 role values',
          element: invalid[0].el.snippet(),
          count: invalid.length,
        }),
      ];
    }
    if (!withRole.length) {
      return [finding({ severity: 'pass', message: 'No ARIA roles found', remediation: 'N/A - No roles to check' })];
    }
    return [
      finding({
        severity: 'pass',
        message: `All ${plural(withRole.length, 'ARIA role')} are valid`,
        remediation: 'N/A - Check passed',
      }),
    ];
  },
);

export default mod;
