import type {
  Job,
  JobStatus,
  LifecycleOperation,
  LifecycleResult,
  LifecycleViolation,
  LifecycleViolationCode,
  RouteStats
} from '../types';

/**
 * Job lifecycle transitions.
 * Pure functions only: each returns a new job (or job list) and never touches
 * its input. Illegal requests come back as violations with state unchanged.
 */

const START_FROM: JobStatus[] = ['pending', 'skipped'];
const COMPLETE_FROM: JobStatus[] = ['inProgress'];

export const violation = (
  code: LifecycleViolationCode,
  operation: LifecycleOperation,
  message: string,
  job?: Pick<Job, 'id' | 'status'>
): { ok: false; violation: LifecycleViolation } => ({
  ok: false,
  violation: {
    type: 'lifecycle',
    code,
    operation,
    message,
    jobId: job?.id,
    status: job?.status
  }
});

export const canStart = (status: JobStatus): boolean => START_FROM.includes(status);

export const canComplete = (status: JobStatus): boolean => COMPLETE_FROM.includes(status);

export const startJob = (job: Job, now: Date): LifecycleResult<Job> => {
  if (!canStart(job.status)) {
    return violation('illegalTransition', 'start', `Cannot start a job that is ${job.status}`, job);
  }
  return { ok: true, value: { ...job, status: 'inProgress', startTime: now } };
};

export const completeJob = (job: Job, signature: string, now: Date): LifecycleResult<Job> => {
  if (!canComplete(job.status)) {
    return violation('illegalTransition', 'complete', `Cannot complete a job that is ${job.status}`, job);
  }
  if (!signature) {
    return violation('missingSignature', 'complete', 'A signature is required to complete a job', job);
  }
  return { ok: true, value: { ...job, status: 'completed', completionTime: now, signature } };
};

/** Skipping is accepted from any status, including an already skipped job. */
export const skipJob = (job: Job): LifecycleResult<Job> => ({ ok: true, value: { ...job, status: 'skipped' } });

/**
 * Moves the job at `fromIndex` so it lands at `toIndex` of the list after
 * removal. A destination past the end is clamped to the end.
 */
export const moveJob = (jobs: Job[], fromIndex: number, toIndex: number): LifecycleResult<Job[]> => {
  if (!Number.isInteger(fromIndex) || fromIndex < 0 || fromIndex >= jobs.length) {
    return violation('indexOutOfRange', 'move', `Source index ${fromIndex} is outside 0..${jobs.length - 1}`);
  }
  if (!Number.isInteger(toIndex) || toIndex < 0) {
    return violation('indexOutOfRange', 'move', `Destination index ${toIndex} is negative or not an integer`);
  }
  const next = [...jobs];
  const [moved] = next.splice(fromIndex, 1);
  next.splice(Math.min(toIndex, next.length), 0, moved);
  return { ok: true, value: next };
};

export const replaceJob = (jobs: Job[], updated: Job): Job[] => jobs.map(job => (job.id === updated.id ? updated : job));

export const computeRouteStats = (jobs: Job[]): RouteStats => {
  const total = jobs.length;
  const completed = jobs.filter(job => job.status === 'completed').length;
  const skipped = jobs.filter(job => job.status === 'skipped').length;
  return {
    total,
    completed,
    skipped,
    remaining: total - completed - skipped,
    completionPercentage: total ? completed / total : 0
  };
};
