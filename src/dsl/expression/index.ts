export { ExprBuilder } from './expr-builder.js';
export { createDsl, field, literal, all, any, not, type Dsl } from './factories.js';
