// Middleware Index
// src/api/middleware/index.ts

export { apiSecurityHeaders } from "./security-headers.js";
