import type { AgentSettings } from "../config";
import type { DecisionSource } from "../agent/views";
import { CancelledError, DecisionFailedError, toError } from "../exceptions";
import type { BaseChatModel } from "../llm/base";
import ppLogger from "../logging_config";
import { AIDecisionProvider } from "./ai";
import { RuleBasedDecisionProvider } from "./rules";
import type {
	Decision,
	DecisionContext,
	DecisionProvider,
	DecisionStrategy,
} from "./views";

const logger = ppLogger.child({ module: "pagepilot/decision/service" });

export interface StrategyOptions {
	agent: AgentSettings;
	/** `null` when no API key is configured */
	llm: BaseChatModel | null;
	actionDescriptions: string;
}

/**
 * Pick the strategy for one task: `ai` when a chat model is available,
 * otherwise the rule table alone.
 */
export function selectDecisionStrategy(options: StrategyOptions): DecisionStrategy {
	const rules = new RuleBasedDecisionProvider({ startUrl: options.agent.startUrl });
	if (!options.llm) {
		logger.info("🧭 No LLM configured, using rule-based decisions");
		return { kind: "rules", primary: rules };
	}
	const ai = new AIDecisionProvider(options.llm, {
		actionDescriptions: options.actionDescriptions,
		historyWindow: options.agent.historyWindow,
		excerptChars: options.agent.pageExcerptChars,
	});
	logger.info(`🧠 Using ${ai.name} with rule-based fallback`);
	return { kind: "ai", primary: ai, fallback: rules };
}

export interface DecisionOutcome {
	decision: Decision;
	source: DecisionSource;
}

/**
 * One decision under `strategy`. With `ai`, a primary failure is retried
 * exactly once through the fallback; if that fails too the primary error is
 * reported through `DecisionFailedError`.
 */
export async function decideNext(
	strategy: DecisionStrategy,
	context: DecisionContext,
): Promise<DecisionOutcome> {
	if (strategy.kind === "rules") {
		return await decideWith(strategy.primary, context);
	}

	try {
		return await decideWith(strategy.primary, context);
	} catch (primaryError) {
		if (primaryError instanceof CancelledError) {
			throw primaryError;
		}
		const providerError = toError(primaryError);
		logger.warn(
			`⚠️ ${strategy.primary.name} failed (${providerError.message}), falling back to ${strategy.fallback.name}`,
		);
		try {
			return await decideWith(strategy.fallback, context);
		} catch (fallbackError) {
			if (fallbackError instanceof CancelledError) {
				throw fallbackError;
			}
			throw new DecisionFailedError(providerError, toError(fallbackError));
		}
	}
}

async function decideWith(
	provider: DecisionProvider,
	context: DecisionContext,
): Promise<DecisionOutcome> {
	const decision = await provider.decide(context);
	return { decision, source: provider.kind };
}
