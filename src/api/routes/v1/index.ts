export { portfolioRoutes, type SessionRouteOptions } from './portfolio.js';
export { tradesRoutes } from './trades.js';
