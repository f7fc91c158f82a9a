import cors from "cors";
import express, {
	type Express,
	type NextFunction,
	type Request,
	type RequestHandler,
	type Response,
} from "express";
import type { BrowserHealth } from "../browser/health";
import {
	TaskNotFoundError,
	TaskStateError,
	ValidationError,
	toError,
} from "../exceptions";
import ppLogger from "../logging_config";
import type { TaskManager } from "./task_manager";
import {
	ApprovalRequestSchema,
	CreateTaskRequestSchema,
	ListTasksQuerySchema,
	parseRequest,
} from "./views";

const logger = ppLogger.child({ module: "pagepilot/server/app" });

export interface AppOptions {
	manager: TaskManager;
	checkHealth: () => Promise<BrowserHealth>;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Express 4 does not forward rejected promises to the error handler. */
function asyncRoute(handler: AsyncHandler): RequestHandler {
	return (req, res, next) => {
		handler(req, res).catch(next);
	};
}

function stepIndexOf(raw: string): number {
	const index = Number(raw);
	if (!Number.isInteger(index) || index < 0) {
		throw new ValidationError(`Invalid step index: ${raw}`);
	}
	return index;
}

function statusFor(error: Error): number {
	if (error instanceof ValidationError) {
		return 400;
	}
	if (error instanceof TaskNotFoundError) {
		return 404;
	}
	if (error instanceof TaskStateError) {
		return 409;
	}
	return 500;
}

export function createApp({ manager, checkHealth }: AppOptions): Express {
	const app = express();
	app.use(cors());
	app.use(express.json());

	app.get(
		"/health",
		asyncRoute(async (_req, res) => {
			const health = await checkHealth();
			res.status(health.status === "unhealthy" ? 503 : 200).json(health);
		}),
	);

	app.post("/tasks", (req, res) => {
		const request = parseRequest(CreateTaskRequestSchema, req.body, "task request");
		const snapshot = manager.submit(request);
		res.status(202).json({ taskId: snapshot.taskId, status: snapshot.status });
	});

	app.get("/tasks", (req, res) => {
		res.json(manager.list(parseRequest(ListTasksQuerySchema, req.query, "query")));
	});

	app.get("/tasks/:id", (req, res) => {
		res.json(manager.get(req.params.id));
	});

	app.delete(
		"/tasks/:id",
		asyncRoute(async (req, res) => {
			res.json(await manager.cancel(req.params.id));
		}),
	);

	app.post("/tasks/:id/approvals/:step", (req, res) => {
		const { approved } = parseRequest(
			ApprovalRequestSchema,
			req.body,
			"approval",
		);
		res.json(
			manager.approve(req.params.id, stepIndexOf(req.params.step), approved),
		);
	});

	app.use((req, res) => {
		res
			.status(404)
			.json({ error: "NotFound", message: `No route for ${req.method} ${req.path}` });
	});

	app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
		if (error instanceof SyntaxError) {
			res.status(400).json({ error: "ValidationError", message: "Malformed JSON body" });
			return;
		}
		const failure = toError(error);
		const status = statusFor(failure);
		if (status === 500) {
			logger.error(`❌ Unhandled error: ${failure.stack ?? failure.message}`);
		}
		res.status(status).json({ error: failure.name, message: failure.message });
	});

	return app;
}
