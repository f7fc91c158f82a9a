export { AIDecisionProvider } from "./ai";
export { RuleBasedDecisionProvider, findTarget, planForTask } from "./rules";
export { decideNext, selectDecisionStrategy } from "./service";
export type { DecisionOutcome } from "./service";
export { AgentDecisionSchema } from "./views";
export type {
	Decision,
	DecisionContext,
	DecisionProvider,
	DecisionStrategy,
} from "./views";
