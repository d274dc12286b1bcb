export { HTTP_METHODS } from "../document.ts";
export type { HttpMethod } from "../document.ts";
export {
  camelCaseToUnderscore,
  createTree,
  isApiDefinition,
  listEndpoints,
  parseEndpointLine,
  parseEndpointText,
  parseEndpoints,
} from "./tree.ts";
export type { EndpointRecord } from "./tree.ts";
export { createProgram, inputOf, serializeDocument } from "./program.ts";
export type { EndpointInput, ProgramIO } from "./program.ts";
