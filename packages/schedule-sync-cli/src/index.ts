#!/usr/bin/env -S node --import tsx
import { Command, Option } from "commander";
import {
  AmbiguousTargetError,
  ScheduleSyncError,
  clearManaged,
  dayRange,
  markDone,
  runSync,
  type ColorScheme
} from "@schedule-sync/core";
import { authorize, DEFAULT_AUTH_PORT, DEFAULT_CREDENTIALS_PATH, DEFAULT_TOKEN_PATH } from "./auth.js";
import { colorSchemeFromConfig, ConfigStore, DEFAULT_CONFIG_PATH, type Config } from "./config.js";
import { GoogleCalendarGateway } from "./gateway.js";
import { parsePort, usageProblem, type GlobalOptions } from "./options.js";
import { formatClearResult, formatFailures, formatMarkDoneResult, formatSyncResult } from "./report.js";
import { DEFAULT_SCHEDULE_PATH, loadSchedule } from "./schedule.js";

/** Built once per invocation and only read afterwards. */
type RunContext = Readonly<{
  config: Config;
  scheme: ColorScheme;
  gateway: GoogleCalendarGateway;
  dryRun: boolean;
}>;

function loadConfig(options: GlobalOptions): Config {
  const { config, created } = new ConfigStore(options.config).load();
  if (created) {
    console.log(`Created ${options.config} with default settings`);
  }
  return config;
}

async function connect(options: GlobalOptions, config: Config): Promise<GoogleCalendarGateway> {
  const auth = await authorize({
    credentialsPath: options.credentials,
    tokenPath: options.token,
    serviceAccountKeyPath: options.serviceAccountKey,
    port: parsePort(options.authPort)
  });
  const gateway = GoogleCalendarGateway.create(auth, config.calendar_id);
  console.log(`calendar=${gateway.calendarId} timezone=${config.timezone}`);
  return gateway;
}

function doneColorFor(config: Config): string | undefined {
  const completion = config.completion_strategies;
  return completion.method === "color_change" ? completion.done_color : undefined;
}

function printFailures(lines: string[]): void {
  for (const line of lines) {
    console.error(line);
  }
}

async function syncSchedule(context: RunContext, schedule: ReturnType<typeof loadSchedule>): Promise<void> {
  const { config, scheme, gateway, dryRun } = context;
  const result = await runSync({
    gateway,
    entries: schedule.entries,
    scheme,
    timeZone: config.timezone,
    dryRun,
    batchSize: config.batch_size,
    doneColorId: doneColorFor(config),
    onBatch: (batch) => console.log(`  batch ${batch.index}/${batch.total}: ${batch.succeeded}/${batch.size} created`)
  });

  const report = { ...result, failed: [...schedule.failed, ...result.failed] };
  for (const line of formatSyncResult(report)) {
    console.log(line);
  }
  printFailures(formatFailures(report.failed));
}

async function clearEvents(context: RunContext): Promise<void> {
  const result = await clearManaged({ gateway: context.gateway, dryRun: context.dryRun });
  for (const line of formatClearResult(result)) {
    console.log(line);
  }
  printFailures(formatFailures(result.failed));
}

async function completeEvent(context: RunContext, name: string, date: string | undefined): Promise<void> {
  const { config, gateway, dryRun } = context;
  const result = await markDone({
    gateway,
    name,
    completion: config.completion_strategies,
    range: dayRange(config.timezone, date),
    doneColorId: config.completion_strategies.done_color,
    dryRun
  });
  console.log(formatMarkDoneResult(result));
}

async function main(): Promise<void> {
  const program = new Command();
  program.name("schedule-sync").description("Push a recurring schedule to Google Calendar");

  program
    .option("--config <path>", "path to JSON config file", DEFAULT_CONFIG_PATH)
    .option("--schedule <path>", "path to JSON schedule rows", DEFAULT_SCHEDULE_PATH)
    .option("--credentials <path>", "OAuth client file", DEFAULT_CREDENTIALS_PATH)
    .option("--token <path>", "stored OAuth token", DEFAULT_TOKEN_PATH)
    .addOption(
      new Option("--service-account-key <path>", "service account key for unattended runs").env("GOOGLE_APPLICATION_CREDENTIALS")
    )
    .option("--auth-port <port>", "loopback port for the OAuth redirect", String(DEFAULT_AUTH_PORT))
    .option("--dry-run", "plan and report without writing", false)
    .addOption(new Option("--clear", "delete every event this tool created").default(false).conflicts("markDone"))
    .option("--mark-done <name>", "mark the matching event as complete")
    .option("--date <yyyy-mm-dd>", "day searched by --mark-done (default: today)")
    .action(async () => {
      const options = program.opts<GlobalOptions>();
      const problem = usageProblem(options);
      if (problem) {
        program.error(`error: ${problem}`);
      }
      const config = loadConfig(options);
      const scheme = colorSchemeFromConfig(config);
      // Schedule problems surface before any sign-in or write.
      const schedule = options.clear || options.markDone !== undefined ? null : loadSchedule(options.schedule);
      if (schedule && schedule.entries.length === 0 && schedule.failed.length === 0) {
        console.log(`No events in ${options.schedule}`);
        return;
      }

      const gateway = await connect(options, config);
      const context: RunContext = Object.freeze({ config, scheme, gateway, dryRun: options.dryRun });

      if (options.markDone !== undefined) {
        await completeEvent(context, options.markDone, options.date);
        return;
      }
      if (options.clear) {
        await clearEvents(context);
        return;
      }
      if (schedule) {
        await syncSchedule(context, schedule);
      }
    });

  program
    .command("validate-config")
    .description("check the config file without contacting the calendar")
    .action(() => {
      const opts = program.opts<GlobalOptions>();
      const errors = new ConfigStore(opts.config).validate();
      if (errors.length > 0) {
        for (const error of errors) {
          console.error(`ERROR: ${error}`);
        }
        process.exitCode = 1;
        return;
      }
      console.log("Config valid");
    });

  program
    .command("calendars")
    .description("list the calendars the credentials can reach")
    .action(async () => {
      const opts = program.opts<GlobalOptions>();
      const gateway = await connect(opts, loadConfig(opts));
      for (const calendar of await gateway.listCalendars()) {
        console.log(`${calendar.primary ? "*" : " "} ${calendar.id}  ${calendar.summary} (${calendar.accessRole})`);
      }
    });

  await program.parseAsync(process.argv);
}

main().catch((error) => {
  if (error instanceof AmbiguousTargetError) {
    console.error(`${error.name}: ${error.message}`);
    for (const match of error.matches) {
      console.error(`  ${match}`);
    }
  } else if (error instanceof ScheduleSyncError) {
    console.error(`${error.name}: ${error.message}`);
  } else {
    console.error(error instanceof Error ? error.stack ?? error.message : String(error));
  }
  process.exit(1);
});
