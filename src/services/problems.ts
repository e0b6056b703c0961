import { decodeBatch, type BatchResult } from '../lib/batch';
import { decode, decodeList, formatIssues } from '../lib/decode';
import { RequestValidationError, ResourceNotFoundError } from '../lib/errors';
import { coerceToJson, encodeProblemJob } from '../lib/serialization';
import {
  ListProblemsFiltersSchema,
  ProblemAnswerEnvelopeSchema,
  ProblemCancelErrorSchema,
  ProblemInfoSchema,
  ProblemInitialStatusSchema,
  ProblemJobSchema,
  ProblemMessageSchema,
  ProblemStatusMaybeWithAnswerSchema,
  ProblemStatusSchema,
  ProblemSubmitErrorSchema,
  type ListProblemsFilters,
  type ProblemAnswer,
  type ProblemCancelError,
  type ProblemInfo,
  type ProblemInitialStatus,
  type ProblemJob,
  type ProblemMessage,
  type ProblemStatus,
  type ProblemStatusMaybeWithAnswer,
  type ProblemStatusWithAnswer,
  type ProblemSubmitError,
} from '../types/models';
import { Resource, segment, type ResourceConfig } from './resource';

export const MAX_PROBLEM_IDS = 1000;

export type SubmitResult = BatchResult<ProblemInitialStatus, ProblemSubmitError>;
export type CancelResult = BatchResult<ProblemStatus, ProblemCancelError>;

export function hasAnswer(status: ProblemStatusMaybeWithAnswer): status is ProblemStatusWithAnswer {
  return status.answer !== undefined && status.answer !== null;
}

// Ids in the `id` filter are comma-separated, so an id may not contain one.
function filterId(id: string): string {
  segment(id, 'Problem id');
  if (id.includes(',')) {
    throw new RequestValidationError('Problem id must not contain a comma', { extras: { id } });
  }
  return id;
}

export class Problems extends Resource {
  static readonly resourcePath = 'problems/';

  constructor(config: ResourceConfig = {}) {
    super(config, Problems.resourcePath);
  }

  /**
   * List problems, optionally filtered by `id` (comma-separated), `label`,
   * `status`, `solver`, and capped by `max_results`.
   */
  async listProblems(filters: ListProblemsFilters = {}): Promise<ProblemStatus[]> {
    const parse = ListProblemsFiltersSchema.safeParse(filters);
    if (!parse.success) {
      throw new RequestValidationError('Invalid problem list filters', {
        extras: { issues: formatIssues(parse.error) },
      });
    }
    const statuses = await this.session.get('', parse.data);
    return decodeList(ProblemStatusSchema, statuses, 'problem status');
  }

  /** Short status of a problem, with its answer once it is solved. */
  async getProblem(problemId: string): Promise<ProblemStatusMaybeWithAnswer> {
    const status = await this.session.get(segment(problemId, 'Problem id'));
    return decode(ProblemStatusMaybeWithAnswerSchema, status, 'problem status');
  }

  async getProblemStatus(problemId: string): Promise<ProblemStatus> {
    const [status] = await this.listProblems({ id: filterId(problemId) });
    if (!status) {
      throw new ResourceNotFoundError(`Problem ${problemId} not found`, { status: 404 });
    }
    return status;
  }

  /**
   * Short statuses for up to `MAX_PROBLEM_IDS` problems in one request.
   *
   * Results come back in the order the service chooses; match them to the
   * request on `id`.
   */
  async getProblemStatuses(problemIds: string[]): Promise<ProblemStatus[]> {
    if (problemIds.length > MAX_PROBLEM_IDS) {
      throw new RequestValidationError(`Number of problem ids is limited to ${MAX_PROBLEM_IDS}`, {
        extras: { received: problemIds.length },
      });
    }
    if (problemIds.length === 0) return [];
    return this.listProblems({ id: problemIds.map(filterId).join(',') });
  }

  async getProblemInfo(problemId: string): Promise<ProblemInfo> {
    const info = await this.session.get(`${segment(problemId, 'Problem id')}/info`);
    return decode(ProblemInfoSchema, info, 'problem info');
  }

  async getProblemAnswer(problemId: string): Promise<ProblemAnswer> {
    const envelope = await this.session.get(`${segment(problemId, 'Problem id')}/answer`);
    return decode(ProblemAnswerEnvelopeSchema, envelope, 'problem answer').answer;
  }

  async getProblemMessages(problemId: string): Promise<ProblemMessage[]> {
    const messages = await this.session.get(`${segment(problemId, 'Problem id')}/messages`);
    return decodeList(ProblemMessageSchema, messages, 'problem message');
  }

  /**
   * Blocking submit of one job, given as a single
   * `{ data, params, solver, type, label }` object. The service holds the
   * request until the problem is solved or its (undisclosed) time limit runs
   * out, so the returned status may or may not carry an answer.
   */
  async submitProblem(job: ProblemJob): Promise<ProblemStatusMaybeWithAnswer> {
    const parse = ProblemJobSchema.safeParse(job);
    if (!parse.success) {
      throw new RequestValidationError('Invalid problem job', {
        extras: { issues: formatIssues(parse.error) },
      });
    }
    const { data, params, solver, type, label } = parse.data;
    const status = await this.session.post('', {
      json: coerceToJson({ data, params, solver, type, label: label ?? null }),
    });
    return decode(ProblemStatusMaybeWithAnswerSchema, status, 'problem status');
  }

  /**
   * Asynchronous multi-problem submit. One result per job, in job order:
   * the initial status of an accepted job, or the error of a rejected one.
   */
  async submitProblems(jobs: ProblemJob[]): Promise<SubmitResult[]> {
    if (jobs.length === 0) return [];

    const body = `[${jobs.map((job, index) => encodeProblemJob(job, index)).join(',')}]`;
    const statuses = await this.session.post('', {
      body,
      headers: { 'Content-Type': 'application/json' },
    });
    return decodeBatch(
      statuses,
      jobs.length,
      { success: ProblemInitialStatusSchema, error: ProblemSubmitErrorSchema },
      'problem submit',
    );
  }

  /** Cancellation is advisory: a problem already done keeps its final status. */
  async cancelProblem(problemId: string): Promise<ProblemStatus> {
    const status = await this.session.delete(`${segment(problemId, 'Problem id')}/`);
    return decode(ProblemStatusSchema, status, 'problem status');
  }

  async cancelProblems(problemIds: string[]): Promise<CancelResult[]> {
    if (problemIds.length === 0) return [];
    problemIds.forEach((id) => segment(id, 'Problem id'));

    const statuses = await this.session.delete('', { json: problemIds });
    return decodeBatch(
      statuses,
      problemIds.length,
      { success: ProblemStatusSchema, error: ProblemCancelErrorSchema },
      'problem cancel',
    );
  }
}
