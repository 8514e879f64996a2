/**
 * Output formatting for the CLI
 */

import { VersionStage, type SecretDescription, type StepOutcome } from '@pgrotate/rotation';

const STAGE_ORDER: string[] = [VersionStage.Current, VersionStage.Pending, VersionStage.Previous];

function stageRank(stages: string[]): number {
  const ranks = stages.map((stage) => STAGE_ORDER.indexOf(stage)).filter((rank) => rank >= 0);
  return ranks.length > 0 ? Math.min(...ranks) : STAGE_ORDER.length;
}

export function formatRotationFlag(rotationEnabled: boolean | undefined): string {
  if (rotationEnabled === undefined) return 'unknown';
  return rotationEnabled ? 'enabled' : 'disabled';
}

/**
 * Render a secret's rotation flag and version → stages map, current first
 */
export function formatStatus(secretId: string, description: SecretDescription): string[] {
  const versions = Object.entries(description.versionStages).sort(
    ([, a], [, b]) => stageRank(a) - stageRank(b)
  );

  const lines = [
    `Secret:   ${description.arn ?? secretId}`,
    `Rotation: ${formatRotationFlag(description.rotationEnabled)}`,
  ];

  if (versions.length === 0) {
    lines.push('Versions: none');
    return lines;
  }

  lines.push('Versions:');
  for (const [versionId, stages] of versions) {
    const ordered = [...stages].sort((a, b) => stageRank([a]) - stageRank([b]));
    lines.push(`  ${versionId}  ${ordered.join(', ')}`);
  }
  return lines;
}

export function formatOutcome(outcome: StepOutcome): string {
  const marker = outcome.changed ? '✓' : '-';
  return `${marker} ${outcome.step}: ${outcome.detail}`;
}
