import { defineRule, plural } from '../../core/rule.js';

/** `alt=""` marks a decorative image and is compliant; only a missing attribute fails. */
const mod = defineRule(
  'images',
  { ruleCode: 'IMG_ALT_MISSING', wcagReference: '1.1.1', wcagLevel: 'AA', principle: 'Perceivable' },
  (doc, finding) => {
    const images = doc.images;
    const missing = images.filter((img) => !img.hasAttr('alt'));

    if (missing.length) {
      return [
        finding({
          severity: 'fail',
          message: `${plural(missing.length, 'image')} missing alt attribute`,
          remediation: "Add descriptive alt text to all images. Use alt='' for decorative images.",
          element: missing[0].snippet(),
          count: missing.length,
        }),
      ];
    }
    if (!images.length) {
      return [finding({ severity: 'pass', message: 'No images found on page', remediation: 'N/A - No images to check' })];
    }
    return [finding({ severity: 'pass', message: 'All images have alt attributes', remediation: 'N/A - Check passed' })];
  },
);

export default mod;
