import { defineRule, plural } from '../../core/rule.js';
import { collectFormControls } from '../../src/a11y/forms.js';

const mod = defineRule(
  'forms',
  { ruleCode: 'FORM_LABEL_MISSING', wcagReference: '3.3.2', wcagLevel: 'AA', principle: 'Operable' },
  (doc, finding) => {
    const fields = collectFormControls(doc);
    const unlabeled = fields.filter((f) => !f.hasLabel);

    if (unlabeled.length) {
      return [
        finding({
          severity: 'fail',
          message: `${plural(unlabeled.length, 'form input')} missing labels`,
          remediation: "Add <label> elements with 'for' attribute, or use aria-label",
          element: unlabeled[0].element.snippet(),
          count: unlabeled.length,
        }),
      ];
    }
    if (!fields.length) {
      return [finding({ severity: 'pass', message: 'No form inputs found on page', remediation: 'N/A - No inputs to check' })];
    }
    return [
      finding({
        severity: 'pass',
        message: `All ${plural(fields.length, 'form input')} have labels`,
        remediation: 'N/A - Check passed',
      }),
    ];
  },
);

export default mod;
