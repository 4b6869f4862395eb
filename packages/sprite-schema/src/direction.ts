import { z } from "zod";

export const directionSchema = z.enum(["down", "up", "left", "right"]);

export type Direction = z.infer<typeof directionSchema>;
