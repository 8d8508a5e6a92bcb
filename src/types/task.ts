/**
 * Task graph types produced by the query decomposer.
 */

export type TaskStatus = 'pending' | 'running' | 'done' | 'failed' | 'skipped';

export type TaskKind = 'simple' | 'sequential' | 'parallel' | 'conditional' | 'comparison';

export interface ConditionalBranches {
  condition: string;
  thenBranch: string;
  elseBranch: string | null;
}

export interface Task {
  text: string;
  /** Position in declaration order */
  index: number;
  /** Indices of tasks that must finish first; always lower than `index` */
  dependencies: number[];
  status: TaskStatus;
  kind: TaskKind;
  /** Present on `conditional` tasks; branch evaluation happens elsewhere */
  conditional?: ConditionalBranches;
  /** Present on `comparison` tasks */
  subject?: string;
}

export interface ExecutionPlan {
  executionOrder: number[];
  estimatedSteps: number;
  /** Groups of task indices whose dependencies are all met by earlier groups */
  waves: number[][];
}
