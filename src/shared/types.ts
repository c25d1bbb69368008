import type { ERROR_CODES, PRESET_NAMES, RELIEF_MODES } from './constants';

export type ReliefMode = (typeof RELIEF_MODES)[number];
export type PresetName = (typeof PRESET_NAMES)[number];
export type ErrorCode = (typeof ERROR_CODES)[number];

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: ErrorCode;
}

export interface InspectionEntry {
  workerId: number;
  count: number;
}

export interface RoundHistoryRecord {
  round: number;
  counts: number[];
  /** Queue contents after the round, as decimal strings. */
  queues: string[][];
}

export interface SimulationReportRecord {
  preset: PresetName | 'custom';
  rounds: number;
  relief: string;
  counts: number[];
  top: [InspectionEntry, InspectionEntry];
  monkeyBusiness: number;
  history?: RoundHistoryRecord[];
}
