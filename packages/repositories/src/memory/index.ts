export { createInMemoryEventStore } from "./event-store";
export type { InMemoryEventStore } from "./event-store";
