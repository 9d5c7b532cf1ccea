/**
 * Pipeline modules export
 */

export { resolve } from "./resolver";
export { execute } from "./pipeline";
export { summary } from "./summary";
