export { default as webhookRoutes } from './webhook-routes.js';
export type { WebhookRouteOptions } from './webhook-routes.js';
export { default as healthRoutes } from './health-routes.js';
