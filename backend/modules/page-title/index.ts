import { defineRule } from '../../core/rule.js';

const MIN_TITLE_LENGTH = 3;

const mod = defineRule(
  'page-title',
  { ruleCode: 'PAGE_TITLE_MISSING', wcagReference: '2.4.2', wcagLevel: 'AA', principle: 'Operable' },
  (doc, finding) => {
    const title = doc.title;

    if (title === undefined) {
      return [
        finding({
          severity: 'fail',
          message: 'Page has no <title> element',
          remediation: 'Add a descriptive <title> element in the <head> section',
        }),
      ];
    }
    if (!title) {
      return [
        finding({
          severity: 'fail',
          message: 'Page title is empty',
          remediation: 'Provide a descriptive, meaningful page title',
          element: '<title></title>',
        }),
      ];
    }
    if ([...title].length < MIN_TITLE_LENGTH) {
      return [
        finding({
          severity: 'warning',
          message: `Page title is very short: '${title}'`,
          remediation: 'Provide a more descriptive page title (at least a few words)',
          element: `<title>${title}</title>`,
        }),
      ];
    }
    return [finding({ severity: 'pass', message: `Page has title: '${title}'`, remediation: 'N/A - Check passed' })];
  },
);

export default mod;
