export * from "./fileValidator";
