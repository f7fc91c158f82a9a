import { v4 as uuidv4 } from "uuid";
import type { Logger } from "winston";
import ppLogger from "../logging_config";
import { collapseWhitespace, truncate } from "../utils";
import type {
	BrowserSession,
	ClickTarget,
	PageStateOptions,
	ScrollDirection,
} from "./types";
import { hostOf, normalizeUrl } from "./utils";
import {
	ElementNotFoundError,
	NavigationTimeoutError,
	PageState,
	SessionClosedError,
} from "./views";

const DEFAULT_EXCERPT_CHARS = 2000;

export interface SimulatedElement {
	/** CSS-like selector, e.g. `button#submit` */
	selector: string;
	tag?: string;
	text: string;
	/** Clicking the element navigates here */
	href?: string;
}

export interface SimulatedPage {
	url: string;
	title: string;
	text?: string;
	elements?: SimulatedElement[];
}

export interface SimulatedSessionOptions {
	/** Pages served by URL; anything else gets a generated page */
	pages?: SimulatedPage[];
	/** Navigation to these hosts times out */
	unreachableHosts?: string[];
	/** Fail `start()` this many times before succeeding */
	failStartTimes?: number;
	navigationTimeoutMs?: number;
}

export interface SimulatedInteraction {
	kind: "navigate" | "click" | "type" | "scroll" | "screenshot";
	target: string;
	value?: string;
}

export const SUBMIT_BUTTON: SimulatedElement = {
	selector: "button#submit",
	tag: "button",
	text: "Submit",
};

function defaultPage(url: string): SimulatedPage {
	const host = hostOf(url);
	return {
		url,
		title: host ? `Simulated page for ${host}` : "Simulated Page",
		elements: [SUBMIT_BUTTON],
	};
}

function stripTrailingSlash(url: string): string {
	return url.endsWith("/") ? url.slice(0, -1) : url;
}

function matchesSelector(element: SimulatedElement, selector: string): boolean {
	const wanted = selector
		.split(",")
		.map((part) => part.trim())
		.filter(Boolean);
	return wanted.some(
		(part) => part === element.selector || part === element.tag,
	);
}

function matchesDescription(
	element: SimulatedElement,
	description: string,
): boolean {
	const wanted = description.trim().toLowerCase();
	const text = element.text.trim().toLowerCase();
	if (!wanted || !text) {
		return false;
	}
	return text.includes(wanted) || wanted.includes(text);
}

/**
 * In-memory stand-in for a browser. Pages are plain data; interactions are
 * recorded so tests can assert what the agent did.
 */
export class SimulatedBrowserSession implements BrowserSession {
	readonly id: string = uuidv4();
	readonly kind = "simulated" as const;
	readonly logger: Logger;
	readonly interactions: SimulatedInteraction[] = [];

	private readonly pages = new Map<string, SimulatedPage>();
	private readonly unreachableHosts: Set<string>;
	private readonly navigationTimeoutMs: number;
	private failStartTimes: number;
	private current: SimulatedPage = defaultPage("about:blank");
	private values = new Map<string, string>();
	private scrollX = 0;
	private scrollY = 0;
	private started = false;
	private closed = false;
	private screenshotCount = 0;

	constructor(options: SimulatedSessionOptions = {}) {
		for (const page of options.pages ?? []) {
			this.pages.set(stripTrailingSlash(normalizeUrl(page.url)), page);
		}
		this.unreachableHosts = new Set(
			(options.unreachableHosts ?? []).map((host) => host.toLowerCase()),
		);
		this.failStartTimes = options.failStartTimes ?? 0;
		this.navigationTimeoutMs = options.navigationTimeoutMs ?? 30000;
		this.logger = ppLogger.child({
			module: `pagepilot/browser/simulated/${this.id.slice(-4)}`,
		});
	}

	get isClosed(): boolean {
		return this.closed;
	}

	get currentUrl(): string {
		return this.current.url;
	}

	get scrollPosition(): { x: number; y: number } {
		return { x: this.scrollX, y: this.scrollY };
	}

	/** Value typed into `selector`, if any. */
	valueOf(selector: string): string | undefined {
		return this.values.get(selector);
	}

	async start(): Promise<void> {
		this.ensureOpen();
		if (this.failStartTimes > 0) {
			this.failStartTimes -= 1;
			throw new Error("Simulated browser failed to start");
		}
		this.started = true;
	}

	private ensureOpen(): void {
		if (this.closed) {
			throw new SessionClosedError();
		}
	}

	private ensureReady(): void {
		this.ensureOpen();
		if (!this.started) {
			throw new SessionClosedError("Browser session has not been started");
		}
	}

	async navigate(url: string): Promise<void> {
		this.ensureReady();
		const normalizedUrl = normalizeUrl(url);
		const host = hostOf(normalizedUrl);
		if (host && this.unreachableHosts.has(host.toLowerCase())) {
			throw new NavigationTimeoutError(normalizedUrl, this.navigationTimeoutMs);
		}
		this.interactions.push({ kind: "navigate", target: normalizedUrl });
		this.loadPage(normalizedUrl);
	}

	private loadPage(url: string): void {
		this.current =
			this.pages.get(stripTrailingSlash(url)) ?? defaultPage(url);
		this.values = new Map();
		this.scrollX = 0;
		this.scrollY = 0;
		this.logger.debug(`🔗 Loaded ${url}`);
	}

	private findElement(target: ClickTarget): SimulatedElement {
		const elements = this.current.elements ?? [];
		const { selector, description } = target;
		const found = elements.find(
			(element) =>
				(selector !== undefined && matchesSelector(element, selector)) ||
				(description !== undefined &&
					matchesDescription(element, description)),
		);
		if (!found) {
			throw new ElementNotFoundError(
				selector ?? description ?? "(no selector or description)",
			);
		}
		return found;
	}

	async click(target: ClickTarget): Promise<void> {
		this.ensureReady();
		const element = this.findElement(target);
		this.interactions.push({ kind: "click", target: element.selector });
		if (element.href) {
			this.loadPage(normalizeUrl(element.href));
		}
	}

	async type(selector: string, text: string): Promise<void> {
		this.ensureReady();
		const element = this.findElement({ selector });
		this.values.set(element.selector, text);
		this.interactions.push({
			kind: "type",
			target: element.selector,
			value: text,
		});
	}

	async screenshot(options: { fullPage?: boolean } = {}): Promise<string> {
		this.ensureReady();
		this.screenshotCount += 1;
		const reference = `simulated://screenshot/${this.screenshotCount}`;
		this.interactions.push({
			kind: "screenshot",
			target: reference,
			value: options.fullPage ? "full" : "viewport",
		});
		return reference;
	}

	private pageText(): string {
		if (this.current.text !== undefined) {
			return this.current.text;
		}
		return (this.current.elements ?? []).map((element) => element.text).join(" ");
	}

	async extractText(selector?: string): Promise<string> {
		this.ensureReady();
		if (selector) {
			const element = this.findElement({ selector });
			return collapseWhitespace(
				this.values.get(element.selector) ?? element.text,
			);
		}
		return collapseWhitespace(this.pageText());
	}

	async scroll(direction: ScrollDirection, amount: number): Promise<void> {
		this.ensureReady();
		switch (direction) {
			case "up":
				this.scrollY = Math.max(0, this.scrollY - amount);
				break;
			case "down":
				this.scrollY += amount;
				break;
			case "left":
				this.scrollX = Math.max(0, this.scrollX - amount);
				break;
			case "right":
				this.scrollX += amount;
				break;
		}
		this.interactions.push({
			kind: "scroll",
			target: direction,
			value: String(amount),
		});
	}

	async getPageState(options: PageStateOptions = {}): Promise<PageState> {
		this.ensureReady();
		return new PageState(
			this.current.url,
			this.current.title,
			truncate(
				collapseWhitespace(this.pageText()),
				options.excerptChars ?? DEFAULT_EXCERPT_CHARS,
			),
			options.screenshot ?? null,
		);
	}

	async close(): Promise<void> {
		this.closed = true;
	}
}
