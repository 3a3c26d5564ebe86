// Core data model interfaces
export * from "./common";
export * from "./endpoint";
export * from "./errors";
export * from "./probe";
export * from "./histogram";
export * from "./config";
export * from "./validation";
