export { registerCors, parseAllowedOrigins } from './cors.js';
export { registerSecurityHeaders } from './security-headers.js';
