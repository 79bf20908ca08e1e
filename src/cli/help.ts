const PRIMARY_COMMANDS = [
  {
    name: "check",
    summary: "Check every target once, print the report and exit with the batch status.",
  },
  {
    name: "run",
    summary: "Check every target repeatedly, pausing --interval between batches, until interrupted.",
  },
  {
    name: "help",
    summary: "Show this help message and exit.",
  },
] as const;

const GLOBAL_OPTIONS = [
  {
    flag: "--config <path>",
    description: "Path to a YAML or JSON configuration file.",
  },
  {
    flag: "--targets <path>",
    description: "File with one URL per line (default: website_list.txt).",
  },
  {
    flag: "--workers <number>",
    description: "Number of concurrent workers, clamped to 1..targets (default: 50).",
  },
  {
    flag: "--retries <number>",
    description: "Extra attempts after a transport error (default: 1).",
  },
  {
    flag: "--timeout <duration>",
    description: "Maximum time for one HTTP request, e.g. 500ms, 5s (default: 5s).",
  },
  {
    flag: "--interval <duration>",
    description: "Pause between batches in the run command (default: 30s).",
  },
  {
    flag: "--max-body-bytes <number>",
    description: "Upper bound of body bytes inspected by body rules (default: 65536).",
  },
  {
    flag: "--allow-http",
    description: "Accept plain http:// targets without a policy issue.",
  },
  {
    flag: "--proxy <url>",
    description: "Forward requests through an HTTP proxy. Also honours HTTPS_PROXY / HTTP_PROXY.",
  },
  {
    flag: "--insecure",
    description: "Disable TLS certificate verification (intended for trusted development setups).",
  },
  {
    flag: "--out <text|json|ndjson|prometheus>",
    description: "Select the report format (default: text).",
  },
  {
    flag: "--log-level <level>",
    description: "debug, info, warn, error or silent; logs go to stderr (default: warn).",
  },
  {
    flag: "--version, -v",
    description: "Print the version and exit.",
  },
  {
    flag: "--help, -h",
    description: "Show this help message and exit.",
  },
] as const;

const EXAMPLES = [
  "sitecheck check --targets ./website_list.txt",
  "sitecheck check --config ./sitecheck.yaml --out json --retries 2",
  "sitecheck run --config ./sitecheck.yaml --interval 1m --out prometheus",
] as const;

function formatColumns(rows: readonly { left: string; right: string }[], padding = 2): string {
  const leftWidth = rows.reduce((max, row) => Math.max(max, row.left.length), 0);

  return rows
    .map((row) => {
      const left = row.left.padEnd(leftWidth + padding, " ");
      return `${left}${row.right}`.trimEnd();
    })
    .join("\n");
}

export function renderCliHelp(): string {
  const sections: string[] = [];

  sections.push("sitecheck - concurrent availability and content checks for websites");
  sections.push("");
  sections.push("Usage:");
  sections.push("  sitecheck <command> [options]");
  sections.push("");
  sections.push("Commands:");
  sections.push(
    formatColumns(PRIMARY_COMMANDS.map(({ name, summary }) => ({ left: `  ${name}`, right: summary }))),
  );
  sections.push("");
  sections.push("Options:");
  sections.push(
    formatColumns(
      GLOBAL_OPTIONS.map(({ flag, description }) => ({ left: `  ${flag}`, right: description })),
    ),
  );
  sections.push("");
  sections.push("Exit codes:");
  sections.push("  0 ok, 1 degraded, 2 down, 3 configuration or usage error, 4 internal error");
  sections.push("");
  sections.push("Examples:");

  for (const example of EXAMPLES) {
    sections.push(`  $ ${example}`);
  }

  return `${sections.join("\n")}\n`;
}
