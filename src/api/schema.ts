/**
 * API request bodies that are not owned by a domain module.
 */
import { z } from "zod";

export const SetTemperatureRequestSchema = z.object({
  temperature: z.number().min(5).max(30),
});

export type SetTemperatureRequest = z.infer<typeof SetTemperatureRequestSchema>;
