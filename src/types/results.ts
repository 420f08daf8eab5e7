/**
 * Why a delegated command failed
 */
export type FailureCause =
  | 'network'
  | 'missing-toolchain'
  | 'permission'
  | 'command-failed'
  | 'not-found';

export type StepStatus = 'ok' | 'skipped' | 'failed';

export interface StepResult {
  id: string;
  label: string;
  status: StepStatus;
  message?: string;
  cause?: FailureCause;
}
