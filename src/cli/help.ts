export type HelpTopic =
  | "root"
  | "backup"
  | "snapshot"
  | "watch"
  | "schedule"
  | "list"
  | "status"
  | "prune"
  | "restore";

interface HelpRenderOptions {
  color: boolean;
}

interface CommandHelp {
  usage: string;
  description: string[];
  options?: Array<[string, string]>;
}

const COMMAND_HELP: Record<Exclude<HelpTopic, "root">, CommandHelp> = {
  backup: {
    usage: "n8n-autobackup backup",
    description: [
      "Run one snapshot inside the n8n container and verify it from the host.",
      "Exits non-zero when the verification marker is missing.",
    ],
  },
  snapshot: {
    usage: "n8n-autobackup snapshot",
    description: [
      "Export workflows, credentials and the data directory into a new",
      "timestamped directory. Run inside the container as the n8n user.",
    ],
  },
  watch: {
    usage: "n8n-autobackup watch",
    description: [
      "Watch the n8n data directory and run a backup on change, at most once",
      "per watch.min_interval_seconds after the previous backup finished.",
    ],
  },
  schedule: {
    usage: "n8n-autobackup schedule",
    description: ["Run a backup every schedule.interval_minutes until interrupted."],
  },
  list: {
    usage: "n8n-autobackup list",
    description: ["Show snapshot directories in chronological order."],
  },
  status: {
    usage: "n8n-autobackup status",
    description: ["Show configuration, latest verified snapshot and disk usage."],
  },
  prune: {
    usage: "n8n-autobackup prune",
    description: ["Delete snapshot directories older than retention.max_age_days."],
  },
  restore: {
    usage: "n8n-autobackup restore <snapshot>",
    description: ["Import workflows and credentials from a verified snapshot into n8n."],
  },
};

export function renderHelp(topic: HelpTopic = "root", options: HelpRenderOptions): string {
  const style = createStyle(options.color);
  if (topic !== "root") {
    const help = COMMAND_HELP[topic];
    return [
      style.title(`n8n-autobackup ${topic}`),
      "",
      style.label("Usage"),
      `  ${style.command(help.usage)}`,
      "",
      style.label("Description"),
      ...help.description.map((line) => `  ${line}`),
      "",
      style.label("Options"),
      `  ${style.command("-h, --help")}    Show help for ${topic} command`,
    ].join("\n");
  }

  return [
    style.title("n8n auto-backup"),
    style.subtle("Change-triggered and scheduled n8n snapshots with verification and retention."),
    "",
    style.label("Usage"),
    `  ${style.command("n8n-autobackup <command> [options]")}`,
    "",
    style.label("Commands"),
    `  ${style.command("backup")}                  Run and verify one backup now`,
    `  ${style.command("snapshot")}                Write a snapshot (inside the container)`,
    `  ${style.command("watch")}                   Back up on data directory changes`,
    `  ${style.command("schedule")}                Back up on a fixed interval`,
    `  ${style.command("list")}                    List snapshots`,
    `  ${style.command("status")}                  Show backup health`,
    `  ${style.command("prune")}                   Apply the retention policy now`,
    `  ${style.command("restore <snapshot>")}      Import a snapshot into n8n`,
    "",
    style.label("Global Options"),
    `  ${style.command("--config <path>")}         Settings file (default ~/.config/n8n-autobackup/settings.toml)`,
    `  ${style.command("--debug")}                 Print debug output to stderr`,
    `  ${style.command("--log-file [path]")}       Also write debug output to a file`,
    `  ${style.command("-h, --help")}              Show this help`,
    `  ${style.command("-v, --version")}           Show version`,
    "",
    style.label("Examples"),
    `  ${style.command("n8n-autobackup backup")}`,
    `  ${style.command("n8n-autobackup watch --debug")}`,
    "",
    style.subtle("Use `n8n-autobackup <command> --help` for command-specific usage."),
  ].join("\n");
}

export function isHelpFlag(value: string | undefined): boolean {
  return value === "-h" || value === "--help";
}

export function isHelpTopic(value: string): value is Exclude<HelpTopic, "root"> {
  return Object.hasOwn(COMMAND_HELP, value);
}

function createStyle(color: boolean) {
  return {
    title: (text: string) => paint(color, text, "36"),
    label: (text: string) => paint(color, paint(color, text, "1"), "33"),
    command: (text: string) => paint(color, text, "32"),
    subtle: (text: string) => paint(color, text, "2"),
  };
}

function paint(color: boolean, text: string, code: string): string {
  return color ? `\u001b[${code}m${text}\u001b[0m` : text;
}
