import type { Profile } from './types.js';

function formatAmount(n: number): string {
  return n.toLocaleString('en-US');
}

/**
 * "SGD 5,000-7,000", "SGD 5,000+", "SGD up to 7,000", or "Not specified".
 */
export function formatSalaryExpectation(profile: Profile): string {
  const { salary_min: min, salary_max: max, salary_currency: currency } = profile.preferences;
  if (min != null && max != null) return `${currency} ${formatAmount(min)}-${formatAmount(max)}`;
  if (min != null) return `${currency} ${formatAmount(min)}+`;
  if (max != null) return `${currency} up to ${formatAmount(max)}`;
  return 'Not specified';
}

/**
 * Plain-text profile summary used in ranking and gap prompts.
 * Experience is capped at 5 entries and education at 3.
 */
export function summarizeProfile(profile: Profile): string {
  const parts: string[] = [];
  if (profile.name) parts.push(`Name: ${profile.name}`);
  if (profile.headline) parts.push(`Headline: ${profile.headline}`);
  if (profile.summary) parts.push(`Summary: ${profile.summary}`);
  if (profile.skills.length > 0) parts.push(`Skills: ${profile.skills.join(', ')}`);

  if (profile.experience.length > 0) {
    parts.push('Experience:');
    for (const exp of profile.experience.slice(0, 5)) {
      const duration = exp.duration ? ` (${exp.duration})` : '';
      parts.push(`  - ${exp.title || 'Unknown'} at ${exp.company || 'Unknown'}${duration}`);
    }
  }

  if (profile.education.length > 0) {
    parts.push('Education:');
    for (const edu of profile.education.slice(0, 3)) {
      const field = edu.field ? ` in ${edu.field}` : '';
      parts.push(`  - ${edu.degree}${field} from ${edu.institution}`.trimEnd());
    }
  }

  const prefs = profile.preferences;
  if (prefs.target_roles.length > 0) parts.push(`Target Roles: ${prefs.target_roles.join(', ')}`);
  if (prefs.experience_level) parts.push(`Experience Level: ${prefs.experience_level}`);
  if (prefs.location) parts.push(`Preferred Location: ${prefs.location}`);
  const salary = formatSalaryExpectation(profile);
  if (salary !== 'Not specified') parts.push(`Salary Expectation: ${salary}`);

  return parts.join('\n');
}
