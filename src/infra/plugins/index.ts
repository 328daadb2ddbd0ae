export { registerCors, getAllowedOrigins } from './cors.js';
export { registerSecurityHeaders } from './security-headers.js';
