export { registerSwagger, DOCS_PREFIX } from './swagger.js';
