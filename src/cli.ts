#!/usr/bin/env node

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import process from "node:process";
import { Command } from "commander";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { formatJobSummary, formatStepEvent, formatVerification } from "./observer.js";
import { extractReference } from "./reference.js";
import { ClaimService } from "./service.js";
import { CLAIM_STEP_PLAN } from "./steps.js";

const program = new Command();
program
  .name("claimbot")
  .description("Submit refund claims through the airline's conversational widget")
  .version("0.1.0");

configureRunCommand(program);
configurePlanCommand(program);
configureVerifyCommand(program);
configureExtractCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Error: ${message}`);
  process.exitCode = 1;
});

function configureRunCommand(root: Command): void {
  root
    .command("run")
    .description("Run one claim request end to end and print the outcome")
    .argument("<request>", "Path to a claim request JSON file")
    .option("--headed", "Show the browser window", false)
    .option("--keep-evidence", "Keep evidence snapshots after the run", false)
    .option("--json", "Print the final job record as JSON", false)
    .action(async (requestPath: string, options: { headed: boolean; keepEvidence: boolean; json: boolean }) => {
      const raw: unknown = JSON.parse(await readFile(resolve(requestPath), "utf8"));
      const config = loadConfig();
      config.workers = 1;
      if (options.headed) {
        config.browser.headless = false;
      }
      if (options.keepEvidence) {
        config.evidence.keep = true;
      }

      const service = new ClaimService({
        config,
        logger: createLogger({ level: config.logLevel, env: config.env }),
        onStepEvent: (_jobId, event) => {
          console.log(formatStepEvent(event));
        }
      });

      const job = await service.submit(raw);
      console.log(`Queued job ${job.id}`);
      service.start();

      try {
        const record = await service.waitFor(job.id);
        if (options.json) {
          console.log(JSON.stringify(record, null, 2));
        } else {
          for (const line of formatJobSummary(record)) {
            console.log(line);
          }
        }
        if (record.status !== "completed") {
          process.exitCode = 1;
        }
      } finally {
        await service.stop();
      }
    });
}

function configureVerifyCommand(root: Command): void {
  root
    .command("verify")
    .description("Check that a booking exists and print its flights")
    .argument("<bookingCode>", "Booking reference")
    .argument("<email>", "Email address on the booking")
    .option("--headed", "Show the browser window", false)
    .option("--json", "Print the verification result as JSON", false)
    .action(async (bookingCode: string, email: string, options: { headed: boolean; json: boolean }) => {
      const config = loadConfig();
      if (options.headed) {
        config.browser.headless = false;
      }

      const service = new ClaimService({
        config,
        logger: createLogger({ level: config.logLevel, env: config.env })
      });

      try {
        const result = await service.verify({ bookingCode, bookingEmail: email });
        if (options.json) {
          console.log(JSON.stringify(result, null, 2));
        } else {
          for (const line of formatVerification(result)) {
            console.log(line);
          }
        }
        if (result.status === "error") {
          process.exitCode = 1;
        }
      } finally {
        await service.stop();
      }
    });
}

function configurePlanCommand(root: Command): void {
  root
    .command("plan")
    .description("List the claim steps and their attempt budgets")
    .action(() => {
      CLAIM_STEP_PLAN.forEach((step, index) => {
        const position = String(index + 1).padStart(2, " ");
        const postCondition = step.postCondition ? ` | waits for ${step.postCondition.selector}` : "";
        console.log(`${position}. ${step.name} (${step.id}) | attempts=${step.retries}${postCondition}`);
      });
    });
}

function configureExtractCommand(root: Command): void {
  root
    .command("extract")
    .description("Extract a case reference from conversation text")
    .argument("<text>", "Conversation text")
    .action((text: string) => {
      const reference = extractReference(text);
      if (!reference) {
        console.log("No reference found");
        process.exitCode = 1;
        return;
      }
      console.log(`${reference.value} (${reference.source}: ${reference.pattern})`);
    });
}
