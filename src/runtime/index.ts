export { Logger, type LoggerOptions, type LogLevel } from "./logger.js";
export {
    FORWARDED_SIGNALS,
    exitCodeFor,
    handOffToSupervisor,
    runSupervisor,
    supervisorPlan,
} from "./handoff.js";
export type { Handoff, HandoffPlan, SupervisorExit } from "./handoff.js";
export { STARTUP_SIGNALS, exitOnSignalsUntilHandoff } from "./signals.js";
