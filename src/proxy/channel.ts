/**
 * Management channel to the proxy server.
 *
 * Both operations must be idempotent: adding a present secret and removing an
 * absent one succeed. Implementations throw RetryableTransportError when the
 * channel itself failed and FatalRemoteError when the server refused, and stop
 * work when `signal` aborts.
 */
export interface ProxyControlChannel {
	readonly name: string;
	addSecret(secret: string, signal: AbortSignal): Promise<void>;
	removeSecret(secret: string, signal: AbortSignal): Promise<void>;
	listSecrets?(signal: AbortSignal): Promise<string[]>;
}
