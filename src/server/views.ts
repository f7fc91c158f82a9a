import { z } from "zod";
import type {
	AgentStatus,
	AgentStep,
	PendingApproval,
} from "../agent/views";
import { MAX_ITERATIONS_LIMIT } from "../agent/views";
import type { PageState } from "../browser/views";
import { ValidationError } from "../exceptions";

export const CreateTaskRequestSchema = z.object({
	task: z.string().trim().min(1, "task must not be empty"),
	maxIterations: z.number().int().min(1).max(MAX_ITERATIONS_LIMIT).optional(),
	useRealBrowser: z.boolean().optional(),
	/** Overrides `agent.enableSecurityChecks` for this task */
	enableSecurity: z.boolean().optional(),
});

export type CreateTaskRequest = z.infer<typeof CreateTaskRequestSchema>;

export const ApprovalRequestSchema = z.object({
	approved: z.boolean(),
});

const STATUSES = [
	"running",
	"awaiting_approval",
	"done",
	"failed",
	"iteration_limit_reached",
] as const satisfies readonly AgentStatus[];

export const ListTasksQuerySchema = z.object({
	status: z.enum(STATUSES).optional(),
	limit: z.coerce.number().int().min(1).max(100).default(20),
	offset: z.coerce.number().int().min(0).default(0),
});

export type ListTasksQuery = z.input<typeof ListTasksQuerySchema>;

/**
 * Parse `value` with `schema`, turning issues into one `ValidationError`.
 */
export function parseRequest<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	value: unknown,
	what: string,
): T {
	const parsed = schema.safeParse(value);
	if (!parsed.success) {
		const details = parsed.error.issues
			.map((issue) =>
				issue.path.length > 0
					? `${issue.path.join(".")}: ${issue.message}`
					: issue.message,
			)
			.join("; ");
		throw new ValidationError(`Invalid ${what}: ${details}`);
	}
	return parsed.data;
}

/** What the server reports about one task. */
export interface TaskSnapshot {
	taskId: string;
	task: string;
	status: AgentStatus;
	maxIterations: number;
	useRealBrowser: boolean;
	enableSecurity: boolean;
	iteration: number;
	createdAt: string;
	finishedAt: string | null;
	history: readonly AgentStep[];
	pendingApproval: PendingApproval | null;
	finalPage: PageState | null;
	finalText: string | null;
	success: boolean | null;
	reason: string | null;
	error: string | null;
}

export interface TaskPage {
	total: number;
	limit: number;
	offset: number;
	tasks: TaskSnapshot[];
}
