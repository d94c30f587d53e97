import { Command } from "commander";
import { readResource } from "payrail";
import { withPayrail } from "../utils/runtime.js";

export const readCommand = new Command("read")
	.description("Read a resource, e.g. balance://<account_id> or accounts://all")
	.argument("<uri>", "Resource URI")
	.option("--url <url>", "PostgreSQL connection URL (or set DATABASE_URL)")
	.action(async (uri: string, options: { url?: string }) => {
		const contents = await withPayrail((payrail) => readResource(payrail, uri), {
			url: options.url,
		});
		console.log(contents.text);
	});
