export { defaultProtoDir, getDefaultEventServiceSchema, loadEventServiceSchema } from "./load";
