export { sendJson, sendText } from './http-utils.js'
export { createApiRouter, getPathname } from './router.js'
export type { ApiRouterDeps, RequestListener } from './router.js'
export { createRouteTable, lookupRoute, routeKey } from './route-table.js'
export type { RouteTable, RouteHandler, RouteKey, RouteMethod, RouteTableOptions } from './route-table.js'
export { GREETING } from './routes/root.js'
export { HEALTH_PAYLOAD } from './routes/health.js'
