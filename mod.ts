// Package entry point.
export * from "./src/index";
