/**
 * Input and output locations
 */

import { z } from "zod";

export const PathsConfigSchema = z.object({
	executions: z.string().min(1).default("data/executions.csv"),
	refdata: z.string().min(1).default("data/refdata.csv"),
	marketdata: z.string().min(1).default("data/marketdata.csv"),
	/** Directory the report tables are written to */
	output: z.string().min(1).default("output"),
});
export type PathsConfig = z.infer<typeof PathsConfigSchema>;
