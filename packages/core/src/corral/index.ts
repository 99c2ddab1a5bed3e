export { createCorral } from "./corral.js";
export type { Corral, CorralOptions } from "./corral.js";
