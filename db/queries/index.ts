export * from "./regulations"
export * from "./compliance-checks"
export * from "./reports"
export * from "./monitoring"
export { isUuid } from "./utils"
