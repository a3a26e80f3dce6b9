export * from './sysmon/index.js';
export { createSubsystemLogger, setLogLevel, type SubsystemLogger, type LogLevelName } from './logging/subsystem.js';
