// @statuskit/widget-renderer
// Entry point exports for the pure widget renderer.

export * from "./config/widget_config_v1";
export * from "./sample/widget_sample_v1";
export * from "./stats";
export * from "./status";
export * from "./mode";
export * from "./renderer";
