/**
 * Dashboard Module
 */

export { createDashboardApp, type DashboardDeps } from './app.js';
export { renderStatusPage, type StatusPageData } from './views.js';
