#!/usr/bin/env node
import type { AppConfig } from "./types.js";
import type { CliCommand } from "./cli.js";
import { HELP_TEXT, parseCliArgs } from "./cli.js";
import { loadConfig, logger } from "./config.js";
import { GmailProvider } from "./gmailClient.js";
import { loadRules } from "./rules.js";
import { createRuleEngine } from "./ruleEngine.js";
import { ActionTracker } from "./actionTracker.js";
import { JsonFileActionStorage } from "./actionStorage.js";
import { EmailMonitor } from "./emailMonitor.js";
import { yesterday } from "./dates.js";

/**
 * Main entry point for the mailwarden rule monitor
 */
async function main(): Promise<void> {
  const options = parseCliArgs(process.argv.slice(2));

  if (options.command.name === "help") {
    console.log(HELP_TEXT);
    return;
  }

  const config = loadConfig();
  if (options.verbose) {
    logger.setLevel("debug");
  }
  const readOnly = options.readOnly || config.readOnly;

  logger.info("Mailwarden starting...");
  logger.info(`   Model: ${config.openaiModel}`);
  logger.info(`   Rules file: ${config.rulesFile}`);
  logger.info(`   Check interval: ${config.checkIntervalSeconds} seconds`);
  logger.info(`   Monitored addresses: ${config.monitoredAddresses.join(", ") || "all"}`);
  logger.info(`   Read-only: ${readOnly}`);

  await runCommand(options.command, config, readOnly);
}

async function runCommand(command: CliCommand, config: AppConfig, readOnly: boolean): Promise<void> {
  const provider = new GmailProvider(config.gmailCredentialsFile, config.gmailTokenFile);
  const tracker = new ActionTracker(
    new JsonFileActionStorage(config.actionsFile),
    config.reportTime
  );

  switch (command.name) {
    case "run": {
      const ruleEngine = createRuleEngine(
        await loadRules(config.rulesFile),
        config.openaiApiKey,
        config.openaiModel
      );
      const monitor = new EmailMonitor({
        provider,
        ruleEngine,
        actionTracker: tracker,
        checkIntervalSeconds: config.checkIntervalSeconds,
        monitoredAddresses: config.monitoredAddresses,
        readOnly,
        reportsEnabled: config.reportsEnabled,
        reportRecipient: config.reportRecipient,
      });

      if (!(await monitor.start())) {
        throw new Error("Email monitor failed to start");
      }
      logger.info("Monitor running. Press Ctrl+C to stop.");
      await waitForShutdownSignal();
      await monitor.stop();
      return;
    }

    case "check": {
      const ruleEngine = createRuleEngine(
        await loadRules(config.rulesFile),
        config.openaiApiKey,
        config.openaiModel
      );
      const monitor = new EmailMonitor({
        provider,
        ruleEngine,
        actionTracker: tracker,
        monitoredAddresses: config.monitoredAddresses,
        readOnly,
      });
      const since = new Date(Date.now() - command.sinceMinutes * 60 * 1000);
      const ok = await monitor.runOnce(since);
      await provider.disconnect();
      if (!ok) {
        process.exitCode = 1;
      }
      return;
    }

    case "dry-run": {
      const ruleEngine = createRuleEngine(
        await loadRules(config.rulesFile),
        config.openaiApiKey,
        config.openaiModel
      );
      if (!(await provider.connect())) {
        throw new Error("Failed to connect to email provider");
      }
      const message = await provider.getMessageById(command.messageId);
      if (!message) {
        logger.error(`Email with ID ${command.messageId} not found`);
        process.exitCode = 1;
        await provider.disconnect();
        return;
      }

      const results = await ruleEngine.evaluateEmail(message);
      console.log(`\nMessage: ${message.subject}`);
      console.log(`From: ${message.sender}`);
      console.log(`Location: ${message.location ?? "unknown"}`);
      if (results.length === 0) {
        console.log("\nNo rules matched.");
      }
      for (const result of results) {
        console.log(`\nRule matched: ${result.rule.name}`);
        for (const action of result.actions) {
          console.log(`   Would ${action.type}: ${JSON.stringify(action.parameters)}`);
        }
      }
      await provider.disconnect();
      return;
    }

    case "report": {
      const day = command.date ?? yesterday();
      if (command.send) {
        const recipient = config.reportRecipient ?? config.monitoredAddresses[0];
        if (!recipient) {
          throw new Error("No report recipient configured");
        }
        const sent = await tracker.sendDailyReport(provider, recipient, day);
        await provider.disconnect();
        if (!sent) {
          process.exitCode = 1;
        }
        return;
      }
      console.log(await tracker.generateDailyReport(day, command.format));
      return;
    }

    case "prune": {
      const removed = await tracker.clearOldActions(command.days ?? config.actionsRetentionDays);
      console.log(`Removed ${removed} action records`);
      return;
    }

    case "help":
      console.log(HELP_TEXT);
      return;
  }
}

function waitForShutdownSignal(): Promise<void> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals): void => {
      logger.info(`Received ${signal}, stopping monitor...`);
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      resolve();
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });
}

// Run main
main().catch((error) => {
  logger.error("Fatal error:", error);
  process.exit(1);
});
