export { createForwardCommand, runForwarder, type ForwardCommandOptions } from './forward.js';
export { collectStatus, createStatusCommand, formatStatus, type StatusReport } from './status.js';
