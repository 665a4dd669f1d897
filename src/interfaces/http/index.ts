export { default as dashboardRoutes } from './dashboard-routes.js';
export { default as settingsRoutes } from './settings-routes.js';
export { default as burstRoutes } from './burst-routes.js';
export { default as healthRoutes } from './health-routes.js';
