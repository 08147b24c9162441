export const STAGES = ['extract', 'calculate', 'validate', 'analyze', 'format'] as const;

export type StageName = (typeof STAGES)[number];

export function stageOrdinal(stage: StageName): number {
  return STAGES.indexOf(stage) + 1;
}
