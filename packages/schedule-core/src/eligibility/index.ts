export { checkEligibility } from './eligibility.js';
export type { Eligibility, EligibilityVerdict } from './eligibility.js';
