export * from "./configLine.js";
export * from "./errors.js";
export * from "./boilerplate.js";
export * from "./explanations.js";
export * from "./fileOps.js";
export { EditableConfig } from "./editableConfig.js";
export * from "./sshdParser.js";
export * from "./sshParser.js";
export * from "./sshdConfig.js";
export * from "./sshConfig.js";
export * from "./settings.js";
export { createApp, type AppContext } from "./app.js";
