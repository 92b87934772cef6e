import { EventEmitter } from 'node:events';
import type { Job } from '../domain/entities/Job.js';

export type JobEventPayload = {
  job: Job;
  status: Job['status'];
  event: 'created' | 'status' | 'progress' | 'deleted';
  timestamp: string;
};

type JobListener = (payload: JobEventPayload) => void;

/**
 * In-process publish/subscribe of job changes. Subscribers may listen to every
 * job or to a single job id; the pipeline never waits on them.
 */
export class JobEventBus {
  private emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(0);
  }

  onJob(listener: JobListener): void {
    this.emitter.on('job', listener);
  }

  offJob(listener: JobListener): void {
    this.emitter.off('job', listener);
  }

  onJobId(jobId: string, listener: JobListener): void {
    this.emitter.on(`job:${jobId}`, listener);
  }

  offJobId(jobId: string, listener: JobListener): void {
    this.emitter.off(`job:${jobId}`, listener);
  }

  emitJob(payload: JobEventPayload): void {
    this.emitter.emit('job', payload);
    this.emitter.emit(`job:${payload.job.id}`, payload);
  }
}
