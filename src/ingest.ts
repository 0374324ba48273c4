import "dotenv/config";
import minimist from "minimist";
import { exitOnError, loadConfigOrExit, optionalString } from "./cli-utils.js";
import { runDatasetStage } from "./ingest/dataset.js";
import { runGuidelinePdfStage } from "./ingest/guideline-pdfs.js";
import { runPdfStage } from "./ingest/pdf-download.js";
import { DEFAULT_SEARCH, runPubmedStage } from "./ingest/pubmed.js";
import { logStageReport, type StageReport } from "./ingest/report.js";

const USAGE = `Usage: ingest <stage> [options]

Stages:
  pubmed       search PubMed and write literature records
                 --term <query> --from <YYYY/MM/DD> --to <YYYY/MM/DD> --max <n>
  pdfs         download article PDFs for literature records and extract their text
  guidelines   extract text from the guideline PDF directory   [--dir <path>]
  dataset      filter the curated guideline dataset            [--in <path>]

Common options:
  --config <path>   config file (default: config.json or $GUIDELINE_RAG_CONFIG)
  --out <path>      output file
  --append          keep existing guideline records in the output file`;

async function main(): Promise<void> {
  const args = minimist(process.argv.slice(2), {
    string: ["config", "out", "term", "from", "to", "dir", "in"],
    boolean: ["append", "help"],
  });
  const stage = args._[0];
  if (!stage || args["help"]) {
    console.log(USAGE);
    return;
  }

  const config = loadConfigOrExit(optionalString(args["config"]));
  const log = (msg: string) => console.log(msg);
  const output = optionalString(args["out"]);
  const append = args["append"] === true;

  let report: StageReport;
  switch (stage) {
    case "pubmed": {
      const max = Number(args["max"]);
      report = await runPubmedStage(config, log, {
        output,
        search: {
          term: optionalString(args["term"]) ?? DEFAULT_SEARCH.term,
          minDate: optionalString(args["from"]) ?? DEFAULT_SEARCH.minDate,
          maxDate: optionalString(args["to"]) ?? DEFAULT_SEARCH.maxDate,
          retmax: Number.isInteger(max) && max > 0 ? max : DEFAULT_SEARCH.retmax,
        },
      });
      break;
    }
    case "pdfs":
      report = await runPdfStage(config, log, { output, append });
      break;
    case "guidelines":
      report = await runGuidelinePdfStage(config, log, {
        dir: optionalString(args["dir"]),
        output,
        append,
      });
      break;
    case "dataset":
      report = await runDatasetStage(config, log, {
        input: optionalString(args["in"]),
        output,
        append,
      });
      break;
    default:
      console.error(`Unknown stage: ${stage}\n\n${USAGE}`);
      process.exit(1);
  }

  logStageReport(log, report);
}

main().catch(exitOnError);
