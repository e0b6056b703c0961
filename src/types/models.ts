import { z } from 'zod';

export const ProblemStatusValues = ['PENDING', 'IN_PROGRESS', 'COMPLETED', 'FAILED', 'CANCELLED'] as const;
export const ProblemTypeValues = ['ising', 'qubo', 'bqm', 'dqm'] as const;

export const ProblemStatusEnum = z.enum(ProblemStatusValues);
export const ProblemTypeEnum = z.enum(ProblemTypeValues);
export const AnswerEncodingFormat = z.enum(['qp', 'bq']);

export type ProblemStatusName = z.infer<typeof ProblemStatusEnum>;
export type ProblemType = z.infer<typeof ProblemTypeEnum>;

const Timestamp = z.coerce.date();

// Records keep fields the service adds beyond the ones listed here.

export const SolverConfigurationSchema = z
  .object({
    id: z.string(),
    status: z.string(),
    description: z.string(),
    properties: z.record(z.unknown()),
    avg_load: z.number().nullish(),
  })
  .passthrough();

export const ProblemInitialStatusSchema = z
  .object({
    id: z.string(),
    type: ProblemTypeEnum,
    solver: z.string(),
    label: z.string().nullish(),
    status: ProblemStatusEnum,
    submitted_on: Timestamp,
  })
  .passthrough();

export const ProblemStatusSchema = ProblemInitialStatusSchema.extend({
  solved_on: Timestamp.nullish(),
});

export const ProblemAnswerSchema = z
  .object({
    format: AnswerEncodingFormat,
  })
  .passthrough();

export const ProblemStatusMaybeWithAnswerSchema = ProblemStatusSchema.extend({
  answer: ProblemAnswerSchema.nullish(),
});

export const ProblemDataSchema = z.discriminatedUnion('format', [
  z
    .object({
      format: z.literal('qp'),
      lin: z.string(),
      quad: z.string(),
      offset: z.number().optional(),
    })
    .passthrough(),
  z
    .object({
      format: z.literal('ref'),
      data: z.string().min(1),
    })
    .passthrough(),
]);

export const ProblemMetadataSchema = z
  .object({
    solver: z.string(),
    type: ProblemTypeEnum,
    label: z.string().nullish(),
    status: ProblemStatusEnum,
    submitted_by: z.string(),
    submitted_on: Timestamp,
    solved_on: Timestamp.nullish(),
    messages: z.array(z.record(z.unknown())).nullish(),
  })
  .passthrough();

export const ProblemInfoSchema = z
  .object({
    id: z.string(),
    data: ProblemDataSchema,
    params: z.record(z.unknown()),
    metadata: ProblemMetadataSchema,
    answer: ProblemAnswerSchema.nullish(),
  })
  .passthrough();

export const ProblemAnswerEnvelopeSchema = z.object({
  answer: ProblemAnswerSchema,
});

export const ProblemMessageSchema = z.record(z.unknown());

export const ProblemJobSchema = z.object({
  data: ProblemDataSchema,
  params: z.record(z.unknown()),
  solver: z.string().min(1),
  type: ProblemTypeEnum,
  label: z.string().optional(),
});

export const ProblemSubmitErrorSchema = z
  .object({
    error_code: z.number().int(),
    error_msg: z.string(),
  })
  .passthrough();

export const ProblemCancelErrorSchema = ProblemSubmitErrorSchema.extend({
  id: z.string(),
});

export const ListProblemsFiltersSchema = z
  .object({
    id: z.string().optional(),
    label: z.string().optional(),
    max_results: z.number().int().positive().optional(),
    status: ProblemStatusEnum.optional(),
    solver: z.string().optional(),
  })
  .strict();

export type SolverConfiguration = z.infer<typeof SolverConfigurationSchema>;
export type ProblemInitialStatus = z.infer<typeof ProblemInitialStatusSchema>;
export type ProblemStatus = z.infer<typeof ProblemStatusSchema>;
export type ProblemAnswer = z.infer<typeof ProblemAnswerSchema>;
export type ProblemStatusMaybeWithAnswer = z.infer<typeof ProblemStatusMaybeWithAnswerSchema>;
export type ProblemStatusWithAnswer = ProblemStatusMaybeWithAnswer & { answer: ProblemAnswer };
export type ProblemData = z.infer<typeof ProblemDataSchema>;
export type ProblemMetadata = z.infer<typeof ProblemMetadataSchema>;
export type ProblemInfo = z.infer<typeof ProblemInfoSchema>;
export type ProblemMessage = z.infer<typeof ProblemMessageSchema>;
export type ProblemJob = z.input<typeof ProblemJobSchema>;
export type ProblemSubmitError = z.infer<typeof ProblemSubmitErrorSchema>;
export type ProblemCancelError = z.infer<typeof ProblemCancelErrorSchema>;
export type ListProblemsFilters = z.infer<typeof ListProblemsFiltersSchema>;
