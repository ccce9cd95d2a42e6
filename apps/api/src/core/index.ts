export * from "./types";
export * from "./bonus";
export * from "./payment";
export * from "./month";
export * from "./employee";
export * from "./department";
