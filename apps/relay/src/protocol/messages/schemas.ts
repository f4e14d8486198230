import { z } from "zod";

export const requestSchema = z.object({
    cmd: z.string().default(""),
    channel: z.string().default(""),
    data: z.string().default(""),
});
