export {HostExecutor, formatCommand, type LogLine, type OnLogLine} from './executor.js'
export {ExecaHostExecutor} from './execa-executor.js'
export {BackgroundProcess, type ProcessControl, type StopSignal} from './background-process.js'
export type {BackgroundRequest, CommandRequest, CommandResult, ProcessExit} from './types.js'
