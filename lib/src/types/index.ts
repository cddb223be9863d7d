export * from "./Resources";
export * from "./Node";
export * from "./Schedule";
export * from "./Instance";
export * from "./Agent";
export * from "./common";
