import { v4 as uuidv4 } from "uuid";
import { ErrorInfo } from "./errors.js";
import { ProcessSummary, ProcessWarning } from "./types.js";

export type JobStatus = "running" | "succeeded" | "failed";

export type JobProgress = {
  current: number;
  total: number;
  message: string;
  at: string;
};

export type JobState = {
  id: string;
  createdAt: string;
  sourceFilename: string;
  outputFilename: string;
  status: JobStatus;
  progress: JobProgress[];
  warnings: ProcessWarning[];
  summary?: ProcessSummary;
  error?: ErrorInfo;
  outputBuffer?: Buffer;
};

export type JobStore = {
  createJob: (args: { sourceFilename: string; outputFilename: string }) => JobState;
  getJob: (id: string) => JobState | undefined;
  updateJob: (job: JobState) => JobState;
  deleteJob: (id: string) => boolean;
};

export type JobStoreOptions = {
  maxJobs?: number;
  ttlMs?: number;
  now?: () => number;
};

const DEFAULT_MAX_JOBS = 50;
const DEFAULT_TTL_MS = 60 * 60 * 1000;

/**
 * Keeps jobs in memory. Finished jobs expire after `ttlMs`, and once
 * `maxJobs` are stored the oldest finished ones make room for new ones.
 */
export function createJobStore(options: JobStoreOptions = {}): JobStore {
  const jobs = new Map<string, JobState>();
  const maxJobs = options.maxJobs ?? DEFAULT_MAX_JOBS;
  const ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
  const now = options.now ?? Date.now;

  const isExpired = (job: JobState): boolean =>
    job.status !== "running" && now() - Date.parse(job.createdAt) >= ttlMs;

  const prune = (): void => {
    for (const job of jobs.values()) {
      if (isExpired(job)) {
        jobs.delete(job.id);
      }
    }
    // Map order is insertion order, so the first finished job is the oldest.
    for (const job of jobs.values()) {
      if (jobs.size < maxJobs) {
        break;
      }
      if (job.status !== "running") {
        jobs.delete(job.id);
      }
    }
  };

  return {
    createJob(args) {
      prune();
      const job: JobState = {
        id: uuidv4(),
        createdAt: new Date(now()).toISOString(),
        sourceFilename: args.sourceFilename,
        outputFilename: args.outputFilename,
        status: "running",
        progress: [],
        warnings: []
      };
      jobs.set(job.id, job);
      return job;
    },
    getJob(id) {
      const job = jobs.get(id);
      if (job && isExpired(job)) {
        jobs.delete(id);
        return undefined;
      }
      return job;
    },
    updateJob(job) {
      jobs.set(job.id, job);
      return job;
    },
    deleteJob(id) {
      return jobs.delete(id);
    }
  };
}

export function publicJobView(job: JobState): Omit<JobState, "outputBuffer"> & { downloadable: boolean } {
  const { outputBuffer, ...rest } = job;
  return { ...rest, downloadable: Boolean(outputBuffer) };
}
