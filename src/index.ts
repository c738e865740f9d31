export * from "./logger";
export * from "./errors";
export * from "./health";
export * from "./config";
export * from "./actor";
export * from "./actor_system";
export * from "./transport";
export * from "./in_memory_transport";
export * from "./zeromq_transport";
export * from "./cluster";
export * from "./static_cluster";
export * from "./metrics";
export * from "./service_instance";
export * from "./service_description";
export * from "./scheduler";
export * from "./distribution";
export * from "./blacklist";
export * from "./pending_queue";
export * from "./responder";
export * from "./dispatcher";
export * from "./router_load_gossip";
export * from "./router_rpc";
export * from "./work_stealing";
export * from "./interstitial";
export * from "./handlers";
export * from "./create_router";
