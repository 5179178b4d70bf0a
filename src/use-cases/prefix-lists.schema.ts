import { z } from "zod";

const PrefixListDefinitionSchema = z.object({
    description: z.string().optional(),
    entries: z.array(z.string()).default([]),
});

export const PrefixListsSchema = z.object({
    prefix_lists: z
        .record(PrefixListDefinitionSchema.nullable())
        .nullish()
        .transform((lists) => lists ?? {}),
});

export type PrefixListsInput = z.infer<typeof PrefixListsSchema>;
