import { Command } from "commander";
import { type ToolDefinition, TOOLS } from "payrail";
import pc from "picocolors";

type Paint = (text: string) => string;

const plain: Paint = (text) => text;

/** One line per tool: the name padded to a column, then its description. */
export function formatToolList(
	tools: readonly ToolDefinition[],
	paint: { name: Paint; description: Paint } = { name: plain, description: plain },
): string[] {
	const width = Math.max(0, ...tools.map((tool) => tool.name.length));
	return tools.map(
		(tool) => `${paint.name(tool.name.padEnd(width))}  ${paint.description(tool.description)}`,
	);
}

export const toolsCommand = new Command("tools")
	.description("List the available tools")
	.option("--json", "Print names, descriptions and input schemas as JSON")
	.action((options: { json?: boolean }) => {
		if (options.json) {
			const listing = TOOLS.map(({ name, description, inputSchema }) => ({
				name,
				description,
				inputSchema,
			}));
			console.log(JSON.stringify(listing, null, 2));
			return;
		}
		for (const line of formatToolList(TOOLS, { name: pc.cyan, description: pc.dim })) {
			console.log(line);
		}
	});
