export * from "./monitors";
