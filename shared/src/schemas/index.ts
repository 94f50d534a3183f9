export * from "./application.schema"
