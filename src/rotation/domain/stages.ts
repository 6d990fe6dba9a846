import type { VersionId } from './ids.js';
import { asVersionId } from './ids.js';

/**
 * Stage labels as they appear on the wire.
 * Any other label a version carries (e.g. AWSPREVIOUS) is preserved but never acted on.
 */
export const STAGE = {
  current: 'AWSCURRENT',
  pending: 'AWSPENDING',
} as const;

export type StageLabel = (typeof STAGE)[keyof typeof STAGE];

export type VersionStageMap = ReadonlyMap<VersionId, ReadonlySet<string>>;

export function versionStageMapFrom(raw: Readonly<Record<string, readonly string[]>>): VersionStageMap {
  const map = new Map<VersionId, ReadonlySet<string>>();
  for (const [versionId, stages] of Object.entries(raw)) {
    map.set(asVersionId(versionId), new Set(stages));
  }
  return map;
}

export function hasStage(stages: VersionStageMap, versionId: VersionId, stage: StageLabel): boolean {
  return stages.get(versionId)?.has(stage) ?? false;
}

/** All versions carrying `stage`. The store guarantees at most one for AWSCURRENT; callers still check. */
export function versionsWithStage(stages: VersionStageMap, stage: StageLabel): readonly VersionId[] {
  const out: VersionId[] = [];
  for (const [versionId, labels] of stages) {
    if (labels.has(stage)) out.push(versionId);
  }
  return out;
}
