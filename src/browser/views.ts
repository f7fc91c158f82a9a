import { PagePilotError } from "../exceptions";

/**
 * Immutable snapshot of the page after an action. A new state supersedes the
 * previous one; states are never mutated.
 */
export class PageState {
	constructor(
		public readonly url: string,
		public readonly title: string,
		public readonly textExcerpt: string,
		/** Reference to a stored screenshot (file path or session-local id) */
		public readonly screenshot: string | null = null,
	) {
		Object.freeze(this);
	}

	static empty(): PageState {
		return new PageState("about:blank", "", "", null);
	}

	withScreenshot(screenshot: string | null): PageState {
		return new PageState(this.url, this.title, this.textExcerpt, screenshot);
	}

	toJSON(): {
		url: string;
		title: string;
		textExcerpt: string;
		screenshot: string | null;
	} {
		return {
			url: this.url,
			title: this.title,
			textExcerpt: this.textExcerpt,
			screenshot: this.screenshot,
		};
	}
}

/**
 * Base class for all browser errors
 */
export class BrowserError extends PagePilotError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "BrowserError";
	}
}

export class ElementNotFoundError extends BrowserError {
	constructor(
		public readonly target: string,
		options?: { cause?: unknown },
	) {
		super(`Element not found: ${target}`, options);
		this.name = "ElementNotFoundError";
	}
}

export class NavigationTimeoutError extends BrowserError {
	constructor(
		public readonly url: string,
		public readonly timeoutMs: number,
		options?: { cause?: unknown },
	) {
		super(`Navigation to ${url} timed out after ${timeoutMs}ms`, options);
		this.name = "NavigationTimeoutError";
	}
}

export class SessionClosedError extends BrowserError {
	constructor(message = "Browser session is closed") {
		super(message);
		this.name = "SessionClosedError";
	}
}
