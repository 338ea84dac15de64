/**
 * @localpilot/tunnel
 *
 * Protocol-agnostic TCP relay from fixed public ports to the
 * application's internal listeners. Node.js built-ins only.
 *
 * @packageDocumentation
 */

export { createTcpRelay } from "./relay.js";
export type { RelayEndpoint, TcpRelay, TcpRelayOptions } from "./relay.js";
