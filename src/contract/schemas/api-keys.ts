import { PositiveIntSchema } from "./base";

export const UserIdInputSchema = PositiveIntSchema;
