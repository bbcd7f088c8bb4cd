import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

export const ANALYZE_DISASTER_APIS = [
  "You are analysing the city's disaster-prevention open-data APIs.",
  "",
  "1. Call `list_saved_apis` to see what is cached. If nothing is, call `scrape_api_docs` first.",
  "2. Read the `city-catalog://groups/disaster` resource, and call `search_api_docs` with keywords such as 防災, 災害 and 避難.",
  "3. Call `get_api_details` for each API you find.",
  "4. Where live data helps, call `generate_api_command` and then `execute_entity_query`.",
  "5. Report on:",
  "   - the kinds of disaster information provided",
  "   - how current the data appears to be",
  "   - how residents could be reached with it",
  "   - concrete improvements",
].join("\n");

export function registerPrompts(server: McpServer): void {
  server.prompt(
    "analyze_disaster_apis",
    "Guided analysis of the cached disaster-prevention APIs",
    async () => ({
      messages: [
        {
          role: "user" as const,
          content: { type: "text" as const, text: ANALYZE_DISASTER_APIS },
        },
      ],
    }),
  );
}
