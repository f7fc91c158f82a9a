const SPECIAL_PROTOCOLS = [
	"about:",
	"mailto:",
	"tel:",
	"ftp:",
	"file:",
	"data:",
	"javascript:",
];

/**
 * Normalize what a user or model calls a URL into something a browser can
 * open.
 *
 * @example
 * ```typescript
 * normalizeUrl('https://example.com/a') // 'https://example.com/a'
 * normalizeUrl('about:blank')           // 'about:blank'
 * normalizeUrl('example.com')           // 'https://example.com'
 * normalizeUrl('localhost:3000')        // 'https://localhost:3000'
 * normalizeUrl('Amazon')                // 'https://www.amazon.com'
 * ```
 */
export function normalizeUrl(url: string): string {
	const normalizedUrl = url.trim();

	if (normalizedUrl.includes("://")) {
		return normalizedUrl;
	}

	for (const protocol of SPECIAL_PROTOCOLS) {
		if (normalizedUrl.startsWith(protocol)) {
			return normalizedUrl;
		}
	}

	// A bare website name such as "amazon"
	if (/^[a-z0-9-]+$/i.test(normalizedUrl) && normalizedUrl !== "localhost") {
		return `https://www.${normalizedUrl.toLowerCase()}.com`;
	}

	return `https://${normalizedUrl}`;
}

/** Host part of a URL, or `null` when it has none. */
export function hostOf(url: string): string | null {
	try {
		const host = new URL(url).hostname;
		return host ? host : null;
	} catch {
		return null;
	}
}
