import { ProfileRegistry } from './registry.js';
import { MarksDistributionProfile } from './marks-distribution.js';
import { StaffRosterProfile } from './staff-roster.js';

export { ProfileRegistry } from './registry.js';
export {
  MarksDistributionProfile,
  MARKS_DISTRIBUTION_DOMAINS,
  type MarksDistributionProfileOptions
} from './marks-distribution.js';
export { StaffRosterProfile, type StaffRosterProfileOptions } from './staff-roster.js';

/** A fresh registry holding the bundled profiles. */
export function createDefaultProfileRegistry(): ProfileRegistry {
  return new ProfileRegistry([new MarksDistributionProfile(), new StaffRosterProfile()]);
}
