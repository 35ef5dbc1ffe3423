/**
 * @gatewarden/jobs
 *
 * Job and job-execution shapes with their input schemas. Jobs are audited
 * through the generic mutation interceptor under JOB_ENTITY and
 * JOB_EXECUTION_ENTITY.
 */

export {
	JobType,
	RunasPolicy,
	ParameterDefineSchema,
	JobInputSchema,
	JobExecutionInputSchema,
	JOB_READ_ONLY_FIELDS,
	JOB_EXECUTION_READ_ONLY_FIELDS,
	JOB_ENTITY,
	JOB_EXECUTION_ENTITY,
	shortId,
	jobToEntityInstance,
	jobExecutionToEntityInstance,
	jobMaterial,
	type JobInput,
	type Job,
	type JobExecutionInput,
	type JobExecution,
} from './job.js';
