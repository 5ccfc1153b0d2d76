import { z } from 'citrine-shared'

const listOf = <S extends z.ZodType>(item: S) => z.array(item).nullish().transform(value => value ?? [])

export const validationErrorSchema = z.object({
    failure_message: z.string().nullish(),
    property: z.string().nullish(),
    input: z.unknown().optional(),
    failure_id: z.string().nullish()
}).loose()

export const apiErrorSchema = z.object({
    code: z.number().int().nullish(),
    message: z.string().nullish(),
    validation_errors: listOf(validationErrorSchema)
}).loose()

export const batchResponseSchema = z.object({
    objects: z.array(z.unknown())
}).loose()

export const jobSubmissionSchema = z.object({
    job_id: z.string().min(1)
}).loose()

export const taskNodeSchema = z.object({
    id: z.string(),
    task_type: z.string(),
    status: z.string(),
    dependencies: listOf(z.string()),
    failure_reason: z.string().nullish()
}).loose()

export const jobStatusSchema = z.object({
    job_type: z.string(),
    status: z.string(),
    tasks: listOf(taskNodeSchema),
    output: z.record(z.string(), z.string()).nullish()
}).loose()

export const deletionFailuresSchema = z.array(z.object({
    id: z.object({ scope: z.string(), id: z.string() }),
    cause: apiErrorSchema
}))
