import { describe, expect, test } from "vitest";
import { SimulatedBrowserSession } from "../../browser/simulated";
import type { BrowserSession } from "../../browser/types";
import { loadSettings } from "../../config";
import { AIDecisionProvider } from "../../decision/ai";
import { RuleBasedDecisionProvider } from "../../decision/rules";
import { HangingChatModel, ScriptedChatModel } from "../../decision/test/scripted_llm";
import type { Decision, DecisionContext, DecisionProvider } from "../../decision/views";
import { getMessageText } from "../../llm/messages";
import { type ApprovalHandler, autoApprove, autoReject } from "../approval";
import { Agent, type AgentOptions } from "../service";
import { type AgentStatus, type PendingApproval, createTask } from "../views";

const settings = loadSettings({}, {});

function task(description: string, maxIterations = 5) {
	return createTask({ description, maxIterations, useRealBrowser: false });
}

/** Collects every session the agent opens. */
function sessions() {
	const opened: SimulatedBrowserSession[] = [];
	const openSession = async (): Promise<BrowserSession> => {
		const session = new SimulatedBrowserSession();
		await session.start();
		opened.push(session);
		return session;
	};
	return { opened, openSession };
}

function agentFor(
	description: string,
	options: Partial<AgentOptions> & { maxIterations?: number } = {},
) {
	const { opened, openSession } = sessions();
	const agent = new Agent(task(description, options.maxIterations), {
		settings,
		approvalHandler: autoReject,
		llm: null,
		openSession,
		...options,
	});
	return { agent, opened };
}

class CountingFallback implements DecisionProvider {
	readonly kind = "rules" as const;
	readonly name = "counting-rules";
	calls = 0;
	private readonly rules = new RuleBasedDecisionProvider({
		startUrl: "https://example.com",
	});

	decide(context: DecisionContext): Promise<Decision> {
		this.calls += 1;
		return this.rules.decide(context);
	}
}

describe("Agent", () => {
	test("should read the start page with the rule table", async () => {
		const { agent, opened } = agentFor("read the page title");
		const result = await agent.run();

		expect(result.status).toBe("done");
		expect(result.success).toBe(true);
		expect(result.finalText).toBe("Submit");
		expect(result.reason).toBeNull();
		expect(result.error).toBeNull();
		expect(result.history.map((step) => step.action)).toEqual([
			{ name: "navigate", url: "https://example.com" },
			{ name: "extract_text" },
		]);
		expect(result.history.map((step) => step.outcome)).toEqual(["ok", "ok"]);
		expect(result.history.map((step) => step.provider)).toEqual(["rules", "rules"]);
		expect(result.finalPage?.url).toBe("https://example.com");
		expect(opened).toHaveLength(1);
		expect(opened[0]?.isClosed).toBe(true);
	});

	test("should skip a rejected destructive action and keep going", async () => {
		const llm = new ScriptedChatModel([
			{
				thinking: "Find the delete button",
				action: { name: "click", description: "Delete account" },
				done: null,
			},
			{ thinking: "", action: null, done: { text: "Not deleted", success: false } },
		]);
		const requests: PendingApproval[] = [];
		const statuses: AgentStatus[] = [];
		const approvalHandler: ApprovalHandler = async (request) => {
			requests.push(request);
			return false;
		};
		const { agent, opened } = agentFor("delete my account", {
			llm,
			approvalHandler,
			registerStatusCallback: (status) => {
				statuses.push(status);
			},
		});

		const result = await agent.run();

		expect(requests).toHaveLength(1);
		expect(requests[0]?.message).toBe("Click on element: Delete account");
		expect(requests[0]?.stepIndex).toBe(0);
		expect(requests[0]?.taskId).toBe(agent.task.id);
		expect(statuses).toEqual(["awaiting_approval", "running", "done"]);

		const [step] = result.history;
		expect(step?.outcome).toBe("skipped");
		expect(step?.approved).toBe(false);
		expect(step?.provider).toBe("ai");
		expect(step?.reasoning).toBe("Find the delete button");
		expect(step?.pageState.url).toBe("about:blank");
		expect(opened[0]?.interactions).toEqual([]);

		expect(result.status).toBe("done");
		expect(result.success).toBe(false);
		expect(result.finalText).toBe("Not deleted");

		const secondPrompt = llm.calls[1]?.[1];
		expect(secondPrompt && getMessageText(secondPrompt)).toContain(
			'0. click("Delete account") -> skipped [rejected]',
		);
	});

	test("should execute an approved destructive action", async () => {
		const llm = new ScriptedChatModel([
			{ thinking: "", action: { name: "click", selector: "button#submit" }, done: null },
			{ thinking: "", action: null, done: { text: "Submitted", success: true } },
		]);
		const { agent, opened } = agentFor("submit the form", {
			llm,
			approvalHandler: autoApprove,
		});

		const result = await agent.run();

		expect(result.history[0]?.approved).toBe(true);
		expect(result.history[0]?.outcome).toBe("ok");
		expect(opened[0]?.interactions).toEqual([{ kind: "click", target: "button#submit" }]);
	});

	test("should record a failed action and continue", async () => {
		const llm = new ScriptedChatModel([
			{ thinking: "", action: { name: "click", selector: "#missing" }, done: null },
			{ thinking: "", action: null, done: { text: "Gave up", success: false } },
		]);
		const { agent } = agentFor("open the menu", { llm });

		const result = await agent.run();

		expect(result.status).toBe("done");
		expect(result.history).toHaveLength(1);
		expect(result.history[0]?.outcome).toBe("failed");
		expect(result.history[0]?.approved).toBeNull();
		expect(result.history[0]?.error).toBe("Element not found: #missing");
		expect(agent.iteration).toBe(1);
	});

	test("should fail with the provider error after one fallback attempt", async () => {
		const llm = new ScriptedChatModel([new Error("service down"), new Error("again")]);
		const fallback = new CountingFallback();
		const { agent, opened } = agentFor("xyzzy", {
			strategy: {
				kind: "ai",
				primary: new AIDecisionProvider(llm, { actionDescriptions: "" }),
				fallback,
			},
		});

		const result = await agent.run();

		expect(result.status).toBe("failed");
		expect(result.reason).toBe(
			"LLM provider scripted:scripted-model unavailable: service down",
		);
		expect(result.error).toBe("ProviderUnavailableError");
		expect(result.history).toEqual([]);
		expect(llm.calls).toHaveLength(1);
		expect(fallback.calls).toBe(1);
		expect(opened[0]?.isClosed).toBe(true);
	});

	test("should fall back to the rules when the model fails", async () => {
		const llm = new ScriptedChatModel([
			new Error("down"),
			new Error("down"),
			new Error("down"),
		]);
		const { agent } = agentFor("read the page title", { llm });

		const result = await agent.run();

		expect(result.status).toBe("done");
		expect(result.history.map((step) => step.provider)).toEqual(["rules", "rules"]);
	});

	test("should stop at the iteration limit", async () => {
		const { agent } = agentFor("read the page title", { maxIterations: 1 });

		const result = await agent.run();

		expect(result.status).toBe("iteration_limit_reached");
		expect(result.reason).toBe("Reached the iteration limit of 1");
		expect(result.success).toBe(false);
		expect(result.history).toHaveLength(1);
	});

	test("should end at the limit when the model never finishes", async () => {
		const proposals = [
			{ name: "navigate", url: "https://example.com" },
			{ name: "click", selector: "#missing" },
			{ name: "click", selector: "button#submit" },
			{ name: "scroll", direction: "down", amount: 200 },
		].map((action) => ({ thinking: "", action, done: null }));
		const llm = new ScriptedChatModel([...proposals, ...proposals, ...proposals]);
		const { agent } = agentFor("keep browsing", { llm, maxIterations: 6 });

		const result = await agent.run();

		expect(result.status).toBe("iteration_limit_reached");
		expect(result.history).toHaveLength(6);
		expect(result.history.map((step) => step.outcome)).toEqual([
			"ok",
			"failed",
			"skipped",
			"ok",
			"ok",
			"failed",
		]);
		expect(llm.calls).toHaveLength(6);
	});

	test("should treat a failing approval handler as a reject", async () => {
		const { agent } = agentFor("Click the submit button on example.com", {
			approvalHandler: async () => {
				throw new Error("prompt closed");
			},
		});

		const result = await agent.run();

		expect(result.history.map((step) => step.outcome)).toEqual(["ok", "skipped"]);
		expect(result.history[1]?.approved).toBe(false);
		expect(result.status).toBe("done");
		expect(result.success).toBe(false);
	});

	test("should end as cancelled when aborted mid-decision", async () => {
		const abort = new AbortController();
		const { agent, opened } = agentFor("read the page title", {
			llm: new HangingChatModel(),
			signal: abort.signal,
		});

		const pending = agent.run();
		setTimeout(() => abort.abort(), 10);
		const result = await pending;

		expect(result.status).toBe("failed");
		expect(result.reason).toBe("Cancelled");
		expect(result.error).toBe("CancelledError");
		expect(opened[0]?.isClosed).toBe(true);
	});

	test("should end as cancelled while waiting for approval", async () => {
		const abort = new AbortController();
		const { agent } = agentFor("Click the submit button on example.com", {
			approvalHandler: (_request, signal) =>
				new Promise<boolean>((_resolve, reject) => {
					signal?.addEventListener("abort", () => reject(new Error("aborted")));
				}),
			registerApprovalCallback: () => {
				abort.abort();
			},
			signal: abort.signal,
		});

		const result = await agent.run();

		expect(result.status).toBe("failed");
		expect(result.reason).toBe("Cancelled");
		expect(agent.pendingApproval).toBeNull();
	});

	test("should report a browser that cannot open", async () => {
		const { agent } = agentFor("read the page title", {
			openSession: async () => {
				throw new Error("no browser");
			},
		});

		const result = await agent.run();

		expect(result.status).toBe("failed");
		expect(result.reason).toBe("no browser");
		expect(result.error).toBe("Error");
		expect(result.finalPage).toBeNull();
	});

	test("should survive a throwing step callback", async () => {
		const { agent } = agentFor("read the page title", {
			registerNewStepCallback: () => {
				throw new Error("listener bug");
			},
		});

		const result = await agent.run();

		expect(result.status).toBe("done");
		expect(result.history).toHaveLength(2);
	});

	test("should run only once", async () => {
		const { agent } = agentFor("read the page title");
		await agent.run();
		await expect(agent.run()).rejects.toThrow("has already been run");
	});
});
