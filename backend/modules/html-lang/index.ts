import { defineRule } from '../../core/rule.js';

const mod = defineRule(
  'html-lang',
  { ruleCode: 'HTML_LANG_MISSING', wcagReference: '3.1.1', wcagLevel: 'AA', principle: 'Understandable' },
  (doc, finding) => {
    const html = doc.htmlElement;
    if (!html) {
      return [
        finding({
          severity: 'fail',
          message: 'No <html> tag found',
          remediation: 'Ensure document has a valid <html> tag with lang attribute',
        }),
      ];
    }

    const lang = (html.attr('lang') ?? '').trim();
    if (!lang) {
      return [
        finding({
          severity: 'fail',
          message: '<html> tag missing lang attribute',
          remediation: "Add lang attribute to <html> tag (e.g., <html lang='en'>)",
          element: html.snippet(),
        }),
      ];
    }
    return [finding({ severity: 'pass', message: `Page language is set to '${lang}'`, remediation: 'N/A - Check passed' })];
  },
);

export default mod;
