// @dualstack/rule-kernel
// Entry point exports for the dual-stack rule kernel.

export * from "./kernel";
export * from "./batch";
export * from "./diagnostics";
export * from "./address/address_classifier";
export * from "./params/order_normalizer";
export * from "./family/family_decision";
export * from "./options/options_builder";
export * from "./routing/version_override";
export * from "./routing/family_registry";
export * from "./routing/version_router";
export * from "./emitters/rule_emitter";
