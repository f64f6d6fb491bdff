// src/jobs/jobRegistry.ts

type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

interface IJobSchema {
    type: string;
    required: string[];
    properties: Record<string, FieldType>;
}

export interface IJobPolicy {
    type: string;
    maxAttempts: number; // Max retries
    timeoutSeconds: number; // Lease length granted to a worker
}

export const JOB_TYPES = {
    NOTIFICATION_DISPATCH: 'notification.dispatch',
    LEDGER_OVERDUE_SWEEP: 'ledger.overdue_sweep',
} as const;

export type JobType = (typeof JOB_TYPES)[keyof typeof JOB_TYPES];

// --- Schemas ---
const NOTIFICATION_DISPATCH_SCHEMA: IJobSchema = {
    type: JOB_TYPES.NOTIFICATION_DISPATCH,
    required: ['notificationId'],
    properties: {
        notificationId: 'string',
    },
};

const LEDGER_OVERDUE_SWEEP_SCHEMA: IJobSchema = {
    type: JOB_TYPES.LEDGER_OVERDUE_SWEEP,
    required: [],
    properties: {
        asOf: 'string', // ISO instant; defaults to now
    },
};

// --- Policies ---
// Delivery failures are retried by the dispatcher itself; job-level retries only
// cover unexpected handler errors (e.g. the database being briefly unavailable).
const NOTIFICATION_DISPATCH_POLICY: IJobPolicy = {
    type: NOTIFICATION_DISPATCH_SCHEMA.type,
    maxAttempts: 5,
    timeoutSeconds: 60,
};

const LEDGER_OVERDUE_SWEEP_POLICY: IJobPolicy = {
    type: LEDGER_OVERDUE_SWEEP_SCHEMA.type,
    maxAttempts: 3,
    timeoutSeconds: 600,
};

const JOB_REGISTRY: Record<JobType, { schema: IJobSchema; policy: IJobPolicy }> = {
    [JOB_TYPES.NOTIFICATION_DISPATCH]: { schema: NOTIFICATION_DISPATCH_SCHEMA, policy: NOTIFICATION_DISPATCH_POLICY },
    [JOB_TYPES.LEDGER_OVERDUE_SWEEP]: { schema: LEDGER_OVERDUE_SWEEP_SCHEMA, policy: LEDGER_OVERDUE_SWEEP_POLICY },
};

export function isJobType(value: string): value is JobType {
    return Object.prototype.hasOwnProperty.call(JOB_REGISTRY, value);
}

function matchesType(value: unknown, expected: FieldType): boolean {
    switch (expected) {
        case 'array':
            return Array.isArray(value);
        case 'object':
            return typeof value === 'object' && value !== null && !Array.isArray(value);
        default:
            return typeof value === expected;
    }
}

/**
 * Validates a job payload against its registered schema.
 * @throws {Error} - 'JobTypeNotFound' or 'SchemaValidationFailed'.
 */
export function validateJobPayload(jobType: string, payload: Record<string, unknown>): void {
    if (!isJobType(jobType)) {
        throw new Error('JobTypeNotFound');
    }

    const { schema } = JOB_REGISTRY[jobType];
    const errors: string[] = [];

    schema.required.forEach(field => {
        if (!Object.prototype.hasOwnProperty.call(payload, field)) {
            errors.push(`Missing required field: ${field}`);
        }
    });

    for (const [field, value] of Object.entries(payload)) {
        const expectedType = schema.properties[field];
        if (expectedType && !matchesType(value, expectedType)) {
            errors.push(`Invalid type for field ${field}: expected ${expectedType}, got ${typeof value}`);
        }
    }

    if (errors.length > 0) {
        throw new Error(`SchemaValidationFailed: ${errors.join('; ')}`);
    }
}

/** Retrieves the execution policy for a job type. */
export function getJobPolicy(jobType: string): IJobPolicy {
    if (!isJobType(jobType)) {
        throw new Error('JobTypeNotFound');
    }
    return JOB_REGISTRY[jobType].policy;
}
