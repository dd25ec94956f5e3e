import net from "node:net";

import { isTransientNetworkError } from "../infra/network-errors.js";
import { retryAsync } from "../infra/retry.js";
import { fetchWithTimeout } from "../infra/timeout.js";
import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "public-host" });

export const PUBLIC_IP_URL = "https://api.ipify.org";

/**
 * Host to put into proxy links: the configured one, or this machine's public
 * IPv4/IPv6 address as reported by ipify.
 */
export async function resolvePublicHost(
	configured: string | undefined,
	fetchFn: typeof fetchWithTimeout = fetchWithTimeout,
): Promise<string> {
	if (configured) return configured;

	const host = await retryAsync(
		async () => {
			const response = await fetchFn(PUBLIC_IP_URL, undefined, 10_000);
			if (!response.ok) {
				throw new Error(`public IP lookup failed: HTTP ${response.status}`);
			}
			const body = (await response.text()).trim();
			if (net.isIP(body) === 0) {
				throw new Error(`public IP lookup returned '${body.slice(0, 64)}'`);
			}
			return body;
		},
		{
			maxAttempts: 3,
			baseDelayMs: 1000,
			label: "public IP lookup",
			shouldRetry: (err) => isTransientNetworkError(err),
			onRetry: (err, info) =>
				logger.warn({ attempt: info.attempt, error: String(err) }, "retrying public IP lookup"),
		},
	);

	logger.info({ host }, "resolved public host");
	return host;
}
