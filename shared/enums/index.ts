// Re-export enum schemas for runtime validation
export { IntervalSchema, AgentTypeSchema, OrderActionSchema } from "../schemas";
