export * from "./fixtures/monitors";
export * from "./helpers";
export * from "./mocks/network";
export * from "./mocks/store";
