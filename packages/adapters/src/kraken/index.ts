export { KrakenBookFeedAdapter } from "./book-feed-adapter";
export { WsConnection, defaultConnectionFactory } from "./ws-connection";
export type { IWsConnection, WsConnectionFactory, WsConnectionOptions, WsFrame } from "./ws-connection";
export {
  KRAKEN_BOOK_DEPTHS,
  KRAKEN_DEFAULT_WS_URL,
  KRAKEN_VENUE,
  KrakenFeedConfigSchema,
  buildBookSubscribeRequest,
  isKrakenBookDepth,
} from "./types";
export type { KrakenBookDepth, KrakenBookSubscribeRequest, KrakenFeedConfig, KrakenFeedConfigInput } from "./types";
