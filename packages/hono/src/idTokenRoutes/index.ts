// route exports
export { tokenInfoRouteHandler } from './routes/tokenInfo.route.js';
