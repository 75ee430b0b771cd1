export * from "./monitoring"
export * from "./regulations"
export * from "./compliance-checks"
export * from "./reports"
