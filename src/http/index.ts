export type { HttpClient, HttpGetOptions, ProbeResponse, UndiciHttpClientOptions } from "./client";
export { createUndiciHttpClient, readBounded } from "./client";
export { RequestTimeoutError, toTransportError, TransportError } from "./errors";
export type { KeepAliveAgentOptions, KeepAliveAgents } from "./keep-alive";
export { createKeepAliveAgents } from "./keep-alive";
export type { HttpRequestOptions, ProxyAgentCache } from "./request";
export { httpRequest } from "./request";
