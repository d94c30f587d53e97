import { Command } from "commander";
import { callTool, PayrailError } from "payrail";
import { withPayrail } from "../utils/runtime.js";

/** Parse the optional JSON argument of `payrail call`. */
export function parseToolArgs(json: string | undefined): unknown {
	if (json === undefined || json.trim() === "") return {};
	try {
		return JSON.parse(json);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw PayrailError.invalidArgument(`Tool arguments are not valid JSON: ${reason}`);
	}
}

export const callCommand = new Command("call")
	.description("Run a tool and print its result envelope")
	.argument("<tool>", "Tool name, see `payrail tools`")
	.argument("[json]", "Tool arguments as a JSON object")
	.option("--url <url>", "PostgreSQL connection URL (or set DATABASE_URL)")
	.action(async (tool: string, json: string | undefined, options: { url?: string }) => {
		const args = parseToolArgs(json);
		const result = await withPayrail((payrail) => callTool(payrail, tool, args), {
			url: options.url,
		});

		for (const content of result.content) {
			console.log(content.text);
		}
		if (result.isError) {
			process.exitCode = 1;
		}
	});
