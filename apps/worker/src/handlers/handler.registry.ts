import type { Job } from '@pipeline/jobs';

/** The entity a job operates on, as loaded by a SubjectResolver. */
export type Subject = {
  id: string;
  [key: string]: unknown;
};

export type HandlerContext = {
  /** Aborted when the job exceeds its timeout. */
  signal: AbortSignal;
};

export interface JobHandler<R = unknown> {
  execute(job: Job, subject: Subject, context: HandlerContext): Promise<R>;
}

export const SUBJECT_RESOLVER = Symbol('SUBJECT_RESOLVER');

export interface SubjectResolver {
  /** null when the subject no longer exists */
  load(subjectId: string): Promise<Subject | null>;
}

/** For handlers whose job details carry everything they need. */
export class PassThroughSubjectResolver implements SubjectResolver {
  async load(subjectId: string): Promise<Subject | null> {
    return { id: subjectId };
  }
}

export class HandlerRegistry {
  private readonly handlers = new Map<string, JobHandler>();

  register(operationType: string, handler: JobHandler): this {
    this.handlers.set(operationType, handler);
    return this;
  }

  get(operationType: string): JobHandler | undefined {
    return this.handlers.get(operationType);
  }

  operationTypes(): string[] {
    return Array.from(this.handlers.keys());
  }
}
