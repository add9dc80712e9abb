import type { ModelPricing } from "../pricing/pricingTable.js";
import type { ChatMessage, StreamEvent } from "./chatTypes.js";

export type TransportRequest = {
  model: ModelPricing;
  messages: ChatMessage[];
  signal: AbortSignal;
};

/**
 * Opens one streamed exchange per call. Setup failures must come back as an
 * `error` event rather than a throw, so decoding is the single place failures
 * are handled.
 */
export interface ChatTransport {
  name: string;
  openStream(request: TransportRequest): AsyncIterable<StreamEvent>;
}
