import type { ExtractionContext, Fragment } from '../types/fragment.js';
import type { DocumentProfile, ProfileDetection, ProfileMatch } from '../types/profile.js';
import { DEFAULT_MIN_PROFILE_CONFIDENCE } from '../types/config.js';
import { createDebugLogger } from '../utils/debug.js';

const debug = createDebugLogger('profiles');

/**
 * Ordered collection of document profiles. Built by the caller and handed
 * to the stitcher; there is no shared default instance.
 */
export class ProfileRegistry {
  private readonly profiles: DocumentProfile[] = [];

  constructor(profiles: Iterable<DocumentProfile> = []) {
    for (const p of profiles) this.register(p);
  }

  register(profile: DocumentProfile): this {
    this.profiles.push(profile);
    return this;
  }

  get size(): number {
    return this.profiles.length;
  }

  get(id: string): DocumentProfile | undefined {
    return this.profiles.find((p) => p.id === id);
  }

  list(): string[] {
    return this.profiles.map((p) => p.id);
  }

  /**
   * Picks the profile with the strictly highest confidence at or above
   * `minConfidence`; on a tie the earlier registration wins. A profile that
   * throws is logged and skipped.
   */
  detect(
    fragments: Fragment[],
    pageTexts: string[],
    context: ExtractionContext = {},
    minConfidence: number = DEFAULT_MIN_PROFILE_CONFIDENCE
  ): ProfileMatch | null {
    let best: ProfileMatch | null = null;
    let bestConfidence = 0;

    for (const profile of this.profiles) {
      let detection: ProfileDetection;
      try {
        detection = profile.detect(fragments, pageTexts, context);
      } catch (error) {
        console.warn(`Profile ${profile.id} failed during detection:`, error);
        continue;
      }

      debug('candidate', profile.id, detection.confidence);
      if (detection.confidence > bestConfidence && detection.confidence >= minConfidence) {
        best = { profile, detection };
        bestConfidence = detection.confidence;
      }
    }

    debug('selected', best ? best.profile.id : 'none');
    return best;
  }
}
