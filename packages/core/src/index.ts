export {
  type Result,
  Ok,
  Err,
  isOk,
  isErr,
  map,
  mapErr,
  andThen,
  unwrapOr,
  unwrap,
  all,
} from "./result.js";

export {
  type TextContent,
  type ToolResponse,
  type ErrorContent,
  textResponse,
  errorResponse,
  successResponse,
  resultToResponse,
  resultToStructuredResponse,
} from "./mcp.js";

export {
  type ServerConfig,
  type ServerBootstrapOptions,
  type RunningServer,
  bootstrapServer,
  runServer,
  McpServer,
} from "./server.js";
