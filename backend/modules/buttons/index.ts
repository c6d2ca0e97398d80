import { defineRule, plural } from '../../core/rule.js';
import { getButtonName } from '../../src/a11y/name.js';

const mod = defineRule(
  'buttons',
  { ruleCode: 'BUTTON_NAME_MISSING', wcagReference: '4.1.2', wcagLevel: 'AA', principle: 'Operable' },
  (doc, finding) => {
    const buttons = doc.buttons;
    const unnamed = buttons.filter((btn) => !getButtonName(btn).text);

    if (unnamed.length) {
      return [
        finding({
          severity: 'fail',
          message: `${plural(unnamed.length, 'button')} missing accessible names`,
          remediation: 'Add text content, value, aria-label, or title to buttons',
          element: unnamed[0].snippet(),
          count: unnamed.length,
        }),
      ];
    }
    if (!buttons.length) {
      return [finding({ severity: 'pass', message: 'No buttons found on page', remediation: 'N/A - No buttons to check' })];
    }
    return [
      finding({
        severity: 'pass',
        message: `All ${plural(buttons.length, 'button')} have accessible names`,
        remediation: 'N/A - Check passed',
      }),
    ];
  },
);

export default mod;
