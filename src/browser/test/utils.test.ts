import { describe, expect, test } from "vitest";
import { loadSettings } from "../../config";
import { BrowserProfile, argsAsDict, argsAsList } from "../profile";
import { hostOf, normalizeUrl } from "../utils";

describe("normalizeUrl", () => {
	test.each([
		["https://example.com/a", "https://example.com/a"],
		["  http://example.com  ", "http://example.com"],
		["about:blank", "about:blank"],
		["mailto:someone@example.com", "mailto:someone@example.com"],
		["example.com", "https://example.com"],
		["localhost:3000", "https://localhost:3000"],
		["localhost", "https://localhost"],
		["Amazon", "https://www.amazon.com"],
	])("should turn %s into %s", (input, expected) => {
		expect(normalizeUrl(input)).toBe(expected);
	});
});

describe("hostOf", () => {
	test("should return the hostname", () => {
		expect(hostOf("https://www.example.com:8080/path")).toBe("www.example.com");
	});

	test("should return null without a host", () => {
		expect(hostOf("about:blank")).toBeNull();
		expect(hostOf("not a url")).toBeNull();
	});
});

describe("BrowserProfile", () => {
	const settings = loadSettings(
		{ browser: { headless: true, slowMoMs: 50, screenshotDir: "/tmp/shots" } },
		{},
	);

	test("should let later flags replace earlier ones", () => {
		expect(
			argsAsList(argsAsDict(["--lang=en", "--no-first-run", "--lang=fr"])),
		).toEqual(["--lang=fr", "--no-first-run"]);
	});

	test("should let user args override the headless flag", () => {
		const profile = BrowserProfile.fromSettings(settings.browser, ["--headless=old"]);
		const args = profile.getArgs();
		expect(args.filter((arg) => arg.startsWith("--headless"))).toEqual([
			"--headless=old",
		]);
		expect(args).toContain("--no-first-run");
	});

	test("should build Playwright launch options", () => {
		const options = BrowserProfile.fromSettings(settings.browser).toLaunchOptions();
		expect(options.headless).toBe(true);
		expect(options.slowMo).toBe(50);
		expect(options.timeout).toBe(30000);
		expect(options.args).toContain("--headless=new");
	});

	test("should keep the configured screenshot directory", () => {
		expect(BrowserProfile.fromSettings(settings.browser).screenshotDir).toBe("/tmp/shots");
	});
});
