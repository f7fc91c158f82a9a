export { openBrowserSession } from "./factory";
export type { OpenBrowserSessionOptions } from "./factory";
export { checkBrowserHealth } from "./health";
export type { BrowserHealth } from "./health";
export { BrowserProfile } from "./profile";
export { PlaywrightBrowserSession } from "./session";
export { SimulatedBrowserSession } from "./simulated";
export type { SimulatedElement, SimulatedPage } from "./simulated";
export type {
	BrowserSession,
	BrowserSessionKind,
	ClickTarget,
	ScrollDirection,
} from "./types";
export { normalizeUrl } from "./utils";
export {
	BrowserError,
	ElementNotFoundError,
	NavigationTimeoutError,
	PageState,
	SessionClosedError,
} from "./views";
