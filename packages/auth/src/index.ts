export * from "./credential-store";
export * from "./crypto";
