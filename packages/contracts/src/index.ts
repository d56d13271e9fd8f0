// @dualstack/contracts
// Wire shapes shared by the rule kernel and its callers.

export * from "./schema/rule_declaration_v1";
export * from "./schema/rule_options_v1";
export * from "./schema/compile_request_v1";
