export { checkSource, extractTitle, runMonitor, type MonitorRunResult } from "./source-monitor"
