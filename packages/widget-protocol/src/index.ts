// @statuskit/widget-protocol
// Entry point exports for the widget directive contract.

export * from "./schema/status_v1";
export * from "./schema/directive_text_v1";
export * from "./schema/widget_action_v1";
export * from "./schema/widget_data_v1";
export * from "./directives";
export * from "./markup";
export * from "./protocol_parser";
