import { z } from 'zod/v4';
import { EntityType, type EntityInstance } from '@gatewarden/domain-core';

/**
 * Job kinds
 */
export const JobType = {
	ADHOC: 'adhoc',
	PLAYBOOK: 'playbook',
} as const;

export type JobType = (typeof JobType)[keyof typeof JobType];

/**
 * How the account a job runs as is chosen on each asset
 */
export const RunasPolicy = {
	SKIP: 'skip',
	PRIVILEGED_ONLY: 'privileged_only',
	PRIVILEGED_FIRST: 'privileged_first',
} as const;

export type RunasPolicy = (typeof RunasPolicy)[keyof typeof RunasPolicy];

/**
 * Declared parameter of a job, prompted for on each execution
 */
export const ParameterDefineSchema = z.object({
	name: z.string().min(1),
	label: z.string().optional(),
	default: z.string().optional(),
});

/**
 * Writable job fields
 */
export const JobInputSchema = z
	.object({
		name: z.string().max(128).nullable().default(null),
		instant: z.boolean().default(false),
		type: z.enum([JobType.ADHOC, JobType.PLAYBOOK]).default(JobType.ADHOC),
		module: z.string().default('shell'),
		args: z.string().default(''),
		playbook: z.string().nullable().default(null),
		assets: z.array(z.string().min(1)).default([]),
		runasPolicy: z
			.enum([RunasPolicy.SKIP, RunasPolicy.PRIVILEGED_ONLY, RunasPolicy.PRIVILEGED_FIRST])
			.default(RunasPolicy.SKIP),
		runas: z.string().default('root'),
		useParameterDefine: z.boolean().default(false),
		parametersDefine: z.array(ParameterDefineSchema).default([]),
		/** Seconds; -1 for no limit */
		timeout: z.number().int().min(-1).default(-1),
		chdir: z.string().default(''),
		comment: z.string().default(''),
		summary: z.record(z.string(), z.unknown()).default({}),
		isPeriodic: z.boolean().default(false),
		/** Hours between periodic runs */
		interval: z.number().int().min(1).nullable().default(null),
		crontab: z.string().max(128).nullable().default(null),
		runAfterSave: z.boolean().default(false),
	})
	.superRefine((job, ctx) => {
		if (job.type === JobType.PLAYBOOK && !job.playbook) {
			ctx.addIssue({ code: 'custom', path: ['playbook'], message: 'A playbook job needs a playbook' });
		}
		if (!job.instant && !job.name) {
			ctx.addIssue({ code: 'custom', path: ['name'], message: 'Only instant jobs may be unnamed' });
		}
		if (job.isPeriodic && job.interval === null && !job.crontab) {
			ctx.addIssue({ code: 'custom', path: ['crontab'], message: 'A periodic job needs an interval or a crontab' });
		}
	});

export type JobInput = z.infer<typeof JobInputSchema>;

/**
 * Fields set by the job engine, never by clients
 */
export const JOB_READ_ONLY_FIELDS = ['id', 'dateLastRun', 'dateCreated', 'dateUpdated', 'averageTimeCost'] as const;

/**
 * Stored job
 */
export interface Job extends JobInput {
	readonly id: string;
	readonly orgId: string;
	/** ID of the user who created the job */
	readonly creator: string;
	readonly dateLastRun: Date | null;
	readonly dateCreated: Date;
	readonly dateUpdated: Date;
	/** Mean run time in seconds */
	readonly averageTimeCost: number;
}

/**
 * Writable execution fields
 */
export const JobExecutionInputSchema = z.object({
	job: z.string().min(1),
	parameters: z.record(z.string(), z.string()).default({}),
});

export type JobExecutionInput = z.infer<typeof JobExecutionInputSchema>;

export const JOB_EXECUTION_READ_ONLY_FIELDS = [
	'id',
	'taskId',
	'timedelta',
	'timeCost',
	'isFinished',
	'dateStart',
	'dateFinished',
	'dateCreated',
	'isSuccess',
	'shortId',
	'jobType',
	'summary',
	'material',
] as const;

/**
 * Stored job execution
 */
export interface JobExecution extends JobExecutionInput {
	readonly id: string;
	readonly orgId: string;
	readonly creator: string;
	readonly taskId: string | null;
	readonly jobType: JobType;
	/** Module and args, or the playbook path */
	readonly material: string;
	readonly isFinished: boolean;
	readonly isSuccess: boolean;
	readonly timeCost: number;
	readonly summary: Record<string, unknown>;
	readonly dateStart: Date | null;
	readonly dateFinished: Date | null;
	readonly dateCreated: Date;
}

/**
 * Entity types under which job mutations are audited
 */
export const JOB_ENTITY = EntityType.define('Job', 'Job');
export const JOB_EXECUTION_ENTITY = EntityType.define('JobExecution', 'Job execution');

const SHORT_ID_LENGTH = 8;

/**
 * First characters of an execution ID, as shown to users
 */
export function shortId(execution: Pick<JobExecution, 'id'>): string {
	return execution.id.slice(0, SHORT_ID_LENGTH);
}

/**
 * Audit view of a job: instant jobs have no name and show their ID.
 */
export function jobToEntityInstance(job: Pick<Job, 'id' | 'name'>): EntityInstance {
	return { id: job.id, display: job.name ?? job.id };
}

export function jobExecutionToEntityInstance(execution: Pick<JobExecution, 'id'>): EntityInstance {
	return { id: execution.id, display: shortId(execution) };
}

/**
 * Material an execution runs: "module:args" for ad hoc jobs, the playbook for playbook jobs.
 */
export function jobMaterial(job: Pick<JobInput, 'type' | 'module' | 'args' | 'playbook'>): string {
	return job.type === JobType.PLAYBOOK ? (job.playbook ?? '') : `${job.module}:${job.args}`;
}
