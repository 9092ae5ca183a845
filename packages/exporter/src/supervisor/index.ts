/**
 * Supervisor Module
 *
 * Runs the watch loop and the metrics server as independent units sharing
 * one registry; the first unit to fail stops the others.
 */

export { Supervisor } from "./supervisor.js";
export type { SupervisedUnit, SupervisorOutcome } from "./supervisor.js";
export { watchUnit, serverUnit } from "./units.js";
