export { createExecutionMonitor, ExecutionMonitorImpl, type ExecutionMonitorOptions } from './execution-monitor-impl.js'
export type { ExecutionMonitor, MonitorResult, WatchContext } from './execution-monitor.js'
