import { ProxyAgent, type Dispatcher } from "undici";

/**
 * Dispatcher that tunnels fetch calls through `proxyUrl`. Undefined means
 * direct connections.
 */
export function createProxyDispatcher(proxyUrl: string | undefined): Dispatcher | undefined {
  return proxyUrl ? new ProxyAgent(proxyUrl) : undefined;
}
