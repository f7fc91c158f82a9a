import type { PageState } from "./views";

// Playwright types the real session is built on
export type {
	Browser,
	BrowserContext,
	LaunchOptions,
	Locator,
	Page,
} from "playwright";

export type BrowserSessionKind = "playwright" | "simulated";

export type ScrollDirection = "up" | "down" | "left" | "right";

export interface ClickTarget {
	selector?: string;
	/** Visible text or accessible name of the element */
	description?: string;
}

export interface PageStateOptions {
	excerptChars?: number;
	screenshot?: string | null;
}

/**
 * One browser page the agent drives. Every method rejects with a
 * `BrowserError` subclass; once `close()` has run, with `SessionClosedError`.
 */
export interface BrowserSession {
	readonly id: string;
	readonly kind: BrowserSessionKind;
	readonly isClosed: boolean;

	start(): Promise<void>;
	navigate(url: string): Promise<void>;
	click(target: ClickTarget): Promise<void>;
	type(selector: string, text: string): Promise<void>;
	/** Capture the page and return a reference to the stored image. */
	screenshot(options?: { fullPage?: boolean }): Promise<string>;
	extractText(selector?: string): Promise<string>;
	scroll(direction: ScrollDirection, amount: number): Promise<void>;
	getPageState(options?: PageStateOptions): Promise<PageState>;
	/** Idempotent. */
	close(): Promise<void>;
}
