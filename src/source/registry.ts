import type { Config, SourceName } from '../shared/config.js';
import type { JobClassifier } from '../classify/classifier.js';
import type { SourceAdapter } from './adapter.js';
import { BlueskyAdapter } from './bluesky.js';
import { ScholarshipDbAdapter } from './scholarshipdb.js';

export function createAdapter(
  name: SourceName,
  config: Config['sources'],
  classifier: JobClassifier | null,
): SourceAdapter {
  switch (name) {
    case 'bluesky':
      return new BlueskyAdapter(config.bluesky, { classifier });
    case 'scholarshipdb':
      return new ScholarshipDbAdapter(config.scholarshipdb);
  }
}

/**
 * Adapters for the enabled sources in configured order, optionally
 * narrowed to `only`.
 */
export function createAdapters(
  config: Config['sources'],
  classifier: JobClassifier | null,
  only?: readonly SourceName[],
): SourceAdapter[] {
  const wanted = only && only.length > 0 ? new Set(only) : null;
  return [...new Set(config.order)]
    .filter((name) => config[name].enabled)
    .filter((name) => wanted === null || wanted.has(name))
    .map((name) => createAdapter(name, config, classifier));
}
