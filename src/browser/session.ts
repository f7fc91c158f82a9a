import { mkdir } from "node:fs/promises";
import path from "node:path";
import { chromium, errors as playwrightErrors } from "playwright";
import { v4 as uuidv4 } from "uuid";
import type { Logger } from "winston";
import { toError } from "../exceptions";
import ppLogger from "../logging_config";
import { collapseWhitespace, timeExecutionAsync, truncate } from "../utils";
import type { BrowserProfile } from "./profile";
import type {
	Browser,
	BrowserContext,
	BrowserSession,
	ClickTarget,
	Locator,
	Page,
	PageStateOptions,
	ScrollDirection,
} from "./types";
import { normalizeUrl } from "./utils";
import {
	BrowserError,
	ElementNotFoundError,
	NavigationTimeoutError,
	PageState,
	SessionClosedError,
} from "./views";

const DEFAULT_EXCERPT_CHARS = 2000;

/**
 * A browser session backed by a Playwright-controlled Chromium page.
 */
export class PlaywrightBrowserSession implements BrowserSession {
	readonly id: string = uuidv4();
	readonly kind = "playwright" as const;
	readonly logger: Logger;

	private browser: Browser | null = null;
	private context: BrowserContext | null = null;
	private page: Page | null = null;
	private closed = false;
	private screenshotCount = 0;

	constructor(private readonly profile: BrowserProfile) {
		this.logger = ppLogger.child({
			module: `pagepilot/browser/session/${this.id.slice(-4)}`,
		});
	}

	get isClosed(): boolean {
		return this.closed;
	}

	@timeExecutionAsync("--start")
	async start(): Promise<void> {
		if (this.closed) {
			throw new SessionClosedError();
		}
		if (this.page) {
			return;
		}

		try {
			if (this.profile.userDataDir) {
				this.context = await chromium.launchPersistentContext(
					this.profile.userDataDir,
					this.profile.toLaunchOptions(),
				);
			} else {
				this.browser = await chromium.launch(this.profile.toLaunchOptions());
				this.context = await this.browser.newContext();
			}
			this.page = this.context.pages()[0] ?? (await this.context.newPage());
			this.page.setDefaultTimeout(this.profile.defaultTimeoutMs);
			this.page.setDefaultNavigationTimeout(this.profile.pageLoadTimeoutMs);
			this.logger.info(
				`🌎 Launched ${this.profile.channel ?? "chromium"} (headless=${this.profile.headless})`,
			);
		} catch (error) {
			await this.releaseResources();
			throw new BrowserError(
				`Failed to launch browser: ${toError(error).message}`,
				{ cause: error },
			);
		}
	}

	private requirePage(): Page {
		if (this.closed) {
			throw new SessionClosedError();
		}
		if (!this.page) {
			throw new BrowserError("Browser session has not been started");
		}
		if (this.page.isClosed()) {
			throw new SessionClosedError("Browser page has been closed");
		}
		return this.page;
	}

	async navigate(url: string): Promise<void> {
		const page = this.requirePage();
		const normalizedUrl = normalizeUrl(url);
		this.logger.debug(`🔗 Navigating to ${normalizedUrl}`);
		try {
			await page.goto(normalizedUrl, { waitUntil: "domcontentloaded" });
		} catch (error) {
			if (error instanceof playwrightErrors.TimeoutError) {
				throw new NavigationTimeoutError(
					normalizedUrl,
					this.profile.pageLoadTimeoutMs,
					{ cause: error },
				);
			}
			throw this.wrapError(`Navigation to ${normalizedUrl} failed`, error);
		}
	}

	private locate(page: Page, target: ClickTarget): Locator {
		if (target.selector) {
			return page.locator(target.selector).first();
		}
		if (target.description) {
			return page.getByText(target.description, { exact: false }).first();
		}
		throw new ElementNotFoundError("(no selector or description)");
	}

	async click(target: ClickTarget): Promise<void> {
		const page = this.requirePage();
		const label = target.selector ?? target.description ?? "";
		const locator = this.locate(page, target);
		try {
			await locator.click({ timeout: this.profile.defaultTimeoutMs });
		} catch (error) {
			if (error instanceof playwrightErrors.TimeoutError) {
				throw new ElementNotFoundError(label, { cause: error });
			}
			throw this.wrapError(`Click on ${label} failed`, error);
		}
	}

	async type(selector: string, text: string): Promise<void> {
		const page = this.requirePage();
		try {
			await page
				.locator(selector)
				.first()
				.fill(text, { timeout: this.profile.defaultTimeoutMs });
		} catch (error) {
			if (error instanceof playwrightErrors.TimeoutError) {
				throw new ElementNotFoundError(selector, { cause: error });
			}
			throw this.wrapError(`Typing into ${selector} failed`, error);
		}
	}

	async screenshot(options: { fullPage?: boolean } = {}): Promise<string> {
		const page = this.requirePage();
		this.screenshotCount += 1;
		const filePath = path.join(
			this.profile.screenshotDir,
			`${this.id}-${this.screenshotCount}.png`,
		);
		try {
			await mkdir(this.profile.screenshotDir, { recursive: true });
			await page.screenshot({
				path: filePath,
				fullPage: options.fullPage ?? false,
			});
		} catch (error) {
			throw this.wrapError("Screenshot failed", error);
		}
		this.logger.debug(`📸 Saved screenshot to ${filePath}`);
		return filePath;
	}

	async extractText(selector?: string): Promise<string> {
		const page = this.requirePage();
		try {
			if (selector) {
				const text = await page
					.locator(selector)
					.first()
					.innerText({ timeout: this.profile.defaultTimeoutMs });
				return collapseWhitespace(text);
			}
			return collapseWhitespace(await page.innerText("body"));
		} catch (error) {
			if (selector && error instanceof playwrightErrors.TimeoutError) {
				throw new ElementNotFoundError(selector, { cause: error });
			}
			throw this.wrapError("Text extraction failed", error);
		}
	}

	async scroll(direction: ScrollDirection, amount: number): Promise<void> {
		const page = this.requirePage();
		const deltaX =
			direction === "left" ? -amount : direction === "right" ? amount : 0;
		const deltaY =
			direction === "up" ? -amount : direction === "down" ? amount : 0;
		try {
			await page.mouse.wheel(deltaX, deltaY);
		} catch (error) {
			throw this.wrapError(`Scroll ${direction} failed`, error);
		}
	}

	async getPageState(options: PageStateOptions = {}): Promise<PageState> {
		const page = this.requirePage();
		try {
			const text = collapseWhitespace(await page.innerText("body"));
			return new PageState(
				page.url(),
				await page.title(),
				truncate(text, options.excerptChars ?? DEFAULT_EXCERPT_CHARS),
				options.screenshot ?? null,
			);
		} catch (error) {
			throw this.wrapError("Reading page state failed", error);
		}
	}

	async close(): Promise<void> {
		if (this.closed) {
			return;
		}
		this.closed = true;
		await this.releaseResources();
		this.logger.debug("🛑 Browser session closed");
	}

	private async releaseResources(): Promise<void> {
		const context = this.context;
		const browser = this.browser;
		this.page = null;
		this.context = null;
		this.browser = null;
		try {
			await context?.close();
			await browser?.close();
		} catch (error) {
			this.logger.warn(
				`⚠️ Error while closing browser: ${toError(error).message}`,
			);
		}
	}

	private wrapError(message: string, error: unknown): BrowserError {
		if (error instanceof BrowserError) {
			return error;
		}
		if (this.page?.isClosed()) {
			return new SessionClosedError("Browser page has been closed");
		}
		return new BrowserError(`${message}: ${toError(error).message}`, {
			cause: error,
		});
	}
}
