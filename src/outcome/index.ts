export * from "./outcome";
export * from "./constructors";
export * from "./matchers";
export * from "./diagnostic";
export * from "./codes";
