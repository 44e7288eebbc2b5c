export * from "./call-site";
export * from "./warnings";
