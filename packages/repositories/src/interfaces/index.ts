/**
 * Repository Interfaces
 */

export * from "./event-store";
