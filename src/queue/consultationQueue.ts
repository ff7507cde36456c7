import { Queue, Worker } from 'bullmq';
import { Redis } from 'ioredis';
import { env } from '../config/env.js';
import { describeError } from '../lib/pipelineErrors.js';
import type { PipelineLogger } from '../pipeline/orchestrator.js';

export type ConsultationJob = {
  sessionId: string;
  version: number;
};

export type ConsultationProcessor = (job: ConsultationJob) => Promise<unknown>;

export interface ConsultationQueue {
  readonly mode: 'bullmq' | 'in_memory';
  registerProcessor(processor: ConsultationProcessor): void;
  enqueue(job: ConsultationJob): Promise<{ queued: boolean; jobId: string }>;
  close(): Promise<void>;
}

const QUEUE_NAME = 'consultation-processing';
const WORKER_CONCURRENCY = 5;

// BullMQ rejects custom ids containing ':'
export function consultationJobId(job: ConsultationJob): string {
  return `${job.sessionId}-v${job.version}`;
}

class InMemoryConsultationQueue implements ConsultationQueue {
  readonly mode = 'in_memory' as const;
  private processor?: ConsultationProcessor;

  registerProcessor(processor: ConsultationProcessor) {
    this.processor = processor;
  }

  async enqueue(job: ConsultationJob) {
    const processor = this.processor;
    if (processor) {
      await processor(job);
    }

    return {
      queued: true,
      jobId: consultationJobId(job)
    };
  }

  async close() {
    return;
  }
}

class BullConsultationQueue implements ConsultationQueue {
  readonly mode = 'bullmq' as const;
  private readonly queue: Queue<ConsultationJob>;
  private readonly fallbackQueue: InMemoryConsultationQueue;
  private processor?: ConsultationProcessor;
  private worker: Worker<ConsultationJob> | null = null;
  private readonly connections: Redis[] = [];

  constructor(
    private readonly redisUrl: string,
    private readonly logger: PipelineLogger
  ) {
    this.queue = new Queue<ConsultationJob>(QUEUE_NAME, {
      connection: this.connect()
    });
    this.fallbackQueue = new InMemoryConsultationQueue();
  }

  private connect(): Redis {
    // BullMQ workers block on Redis commands and require maxRetriesPerRequest to be null
    const connection = new Redis(this.redisUrl, { maxRetriesPerRequest: null });
    this.connections.push(connection);
    return connection;
  }

  registerProcessor(processor: ConsultationProcessor) {
    this.processor = processor;
    this.fallbackQueue.registerProcessor(processor);
  }

  private ensureWorker() {
    if (!this.processor || this.worker) {
      return;
    }

    this.worker = new Worker<ConsultationJob>(
      QUEUE_NAME,
      async (job) => {
        await this.processor?.(job.data);
      },
      {
        connection: this.connect(),
        concurrency: WORKER_CONCURRENCY
      }
    );
  }

  async enqueue(job: ConsultationJob) {
    try {
      const added = await this.queue.add('process', job, {
        jobId: consultationJobId(job),
        removeOnComplete: true,
        removeOnFail: false
      });

      this.ensureWorker();

      return {
        queued: true,
        jobId: String(added.id)
      };
    } catch (error) {
      this.logger.warn(
        { sessionId: job.sessionId, err: describeError(error) },
        'queue.enqueue_failed_falling_back_in_process'
      );
      return this.fallbackQueue.enqueue(job);
    }
  }

  async close() {
    if (this.worker) {
      await this.worker.close();
      this.worker = null;
    }
    await this.queue.close();
    await Promise.all(this.connections.map((connection) => connection.quit()));
  }
}

export type ConsultationQueueOptions = {
  logger: PipelineLogger;
  forceInMemory?: boolean;
};

export function createConsultationQueue(options: ConsultationQueueOptions): ConsultationQueue {
  if (!env.REDIS_URL || options.forceInMemory) {
    return new InMemoryConsultationQueue();
  }

  return new BullConsultationQueue(env.REDIS_URL, options.logger);
}
