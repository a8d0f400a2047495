/**
 * Stage Utilities
 * Text form of a ramp profile: "30s:10,1m,10s:0"
 */

import { DurationParseError, StageParseError } from '../core/errors.js';
import { NULL_INT, durationFrom, intFrom } from '../core/nullable.js';
import type { Stage } from '../types/index.js';
import { formatDuration, parseDuration, type Duration } from './duration.js';

/**
 * Parse comma-separated `<duration>` or `<duration>:<target>` segments.
 * An empty string yields no stages.
 */
export function parseStages(text: string): Stage[] {
  if (text === '') {
    return [];
  }
  return text.split(',').map(parseStage);
}

export function parseStage(segment: string): Stage {
  const colon = segment.indexOf(':');
  const durationText = colon < 0 ? segment : segment.slice(0, colon);
  const targetText = colon < 0 ? '' : segment.slice(colon + 1);

  let duration: Duration;
  try {
    duration = parseDuration(durationText);
  } catch (error) {
    if (error instanceof DurationParseError) {
      throw new StageParseError(segment, `invalid duration "${durationText}"`);
    }
    throw error;
  }

  // "1s:" leaves the target open, same as "1s"
  if (targetText === '') {
    return Object.freeze({ duration: durationFrom(duration), target: NULL_INT });
  }

  const target = Number(targetText);
  if (!/^[-+]?\d+$/.test(targetText) || !Number.isSafeInteger(target)) {
    throw new StageParseError(segment, `invalid target "${targetText}"`);
  }
  return Object.freeze({ duration: durationFrom(duration), target: intFrom(target) });
}

/**
 * Inverse of parseStages for stages that carry a duration
 */
export function formatStages(stages: readonly Stage[]): string {
  return stages
    .map((stage) => {
      const duration = formatDuration(stage.duration.orElse(0));
      return stage.target.valid ? `${duration}:${stage.target.value}` : duration;
    })
    .join(',');
}

export function totalStagesDuration(stages: readonly Stage[] | undefined): Duration {
  return (stages ?? []).reduce((total, stage) => total + stage.duration.orElse(0), 0);
}
