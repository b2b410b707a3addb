export * from "./api";
export * from "./errors";
export * from "./roles";
export * from "./schemas/money";
export * from "./schemas/payments";
export * from "./schemas/accounts";
