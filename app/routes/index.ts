export { healthRouter } from "./health"
export { regulationsRouter } from "./regulations"
export { complianceRouter } from "./compliance"
export { reportsRouter } from "./reports"
export { monitorRouter } from "./monitor"
