import "dotenv/config";
import blessed from "blessed";
import { exitOnError, loadConfigOrExit } from "./cli-utils.js";
import { formatSources } from "./rag/context-builder.js";
import { errorMessage } from "./rag/errors.js";
import { createRagPipeline, type RagPipeline } from "./rag/pipeline.js";

const EXIT_WORDS = new Set(["quit", "exit"]);

// ── Config ──────────────────────────────────────────────────────────────────
const config = loadConfigOrExit();

// ── State ───────────────────────────────────────────────────────────────────
let busy = false;
let pipeline: RagPipeline | null = null;

// ── UI Setup ────────────────────────────────────────────────────────────────
const screen = blessed.screen({
  smartCSR: true,
  title: "guideline-rag",
});

const chatBox = blessed.log({
  parent: screen,
  top: 0,
  left: 0,
  width: "100%",
  height: "100%-3",
  scrollable: true,
  alwaysScroll: true,
  scrollbar: {
    ch: "│",
    style: { bg: "blue" },
  },
  border: { type: "line" },
  style: {
    border: { fg: "blue" },
  },
  label: ` guideline-rag — ${config.llm.model} `,
  tags: true,
  mouse: true,
});

const inputBox = blessed.textbox({
  parent: screen,
  bottom: 0,
  left: 0,
  width: "100%",
  height: 3,
  border: { type: "line" },
  style: {
    border: { fg: "green" },
    focus: { border: { fg: "yellow" } },
  },
  label: " question > ",
  inputOnFocus: false,
  mouse: true,
});

function quit(): never {
  screen.destroy();
  process.exit(0);
}

screen.key(["C-c"], quit);
inputBox.key(["C-c"], quit);

// Re-focus input whenever it loses focus (e.g. mouse click on chatBox).
// setTimeout breaks the blur→focus→render→blur cycle.
inputBox.on("blur", () => {
  if (!busy) setTimeout(() => promptInput(), 0);
});

chatBox.log("Ask a question about the indexed guidelines. Type quit or exit to leave.");
chatBox.log("");
screen.render();

function promptInput(): void {
  inputBox.readInput(() => {/* handled by submit event */});
}

// ── Spinner ─────────────────────────────────────────────────────────────────
const spinFrames = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
let spinIdx = 0;
let spinTimer: ReturnType<typeof setInterval> | null = null;
let spinElapsed = 0;
let spinLabel = "thinking";

function startSpinner(label: string): void {
  stopSpinner();
  spinLabel = label;
  spinIdx = 0;
  spinElapsed = 0;
  updateSpinnerLine();
  spinTimer = setInterval(() => {
    spinIdx = (spinIdx + 1) % spinFrames.length;
    spinElapsed += 100;
    updateSpinnerLine();
  }, 100);
}

function removeSpinnerLine(): void {
  const lines = chatBox.getLines();
  const last = lines[lines.length - 1];
  if (last !== undefined && last.includes(`${spinLabel}...`)) {
    chatBox.deleteLine(lines.length - 1);
  }
}

function updateSpinnerLine(): void {
  removeSpinnerLine();
  const secs = (spinElapsed / 1000).toFixed(1);
  chatBox.log(`{grey-fg}  ${spinFrames[spinIdx] ?? ""} ${spinLabel}... ${secs}s{/}`);
  screen.render();
}

function stopSpinner(): void {
  if (spinTimer) {
    clearInterval(spinTimer);
    spinTimer = null;
  }
  removeSpinnerLine();
}

// ── Question Logic ──────────────────────────────────────────────────────────
async function ask(question: string, rag: RagPipeline): Promise<void> {
  startSpinner("searching guidelines");
  const t0 = performance.now();
  const { answer, sources } = await rag.answerQuestion(question);
  stopSpinner();

  const secs = ((performance.now() - t0) / 1000).toFixed(1);
  chatBox.log(`{grey-fg}  \u{2713} answered in ${secs}s from ${sources.length} source(s){/}`);
  for (const line of answer.split("\n")) {
    chatBox.log(`  ${blessed.escape(line)}`);
  }

  if (sources.length > 0) {
    chatBox.log("");
    chatBox.log("{grey-fg}  Sources:{/}");
    for (const line of formatSources(sources)) {
      chatBox.log(`{grey-fg}  ${blessed.escape(line)}{/}`);
    }
  }
  screen.render();
}

// ── Input Handler ───────────────────────────────────────────────────────────
inputBox.on("submit", (value: string) => {
  const text = value.trim();
  inputBox.clearValue();
  screen.render();

  if (EXIT_WORDS.has(text.toLowerCase())) quit();

  if (!text || busy) {
    promptInput();
    return;
  }
  if (!pipeline) {
    chatBox.log("{yellow-fg}Still loading the index, try again in a moment.{/}");
    screen.render();
    promptInput();
    return;
  }

  chatBox.log(`{green-fg}question >{/} ${blessed.escape(text)}`);
  busy = true;
  inputBox.style.border.fg = "grey";
  inputBox.setLabel(" ... ");
  screen.render();

  ask(text, pipeline)
    .catch((err: unknown) => {
      stopSpinner();
      chatBox.log(`{red-fg}error:{/} ${blessed.escape(errorMessage(err))}`);
    })
    .finally(() => {
      busy = false;
      chatBox.log("");
      inputBox.style.border.fg = "green";
      inputBox.setLabel(" question > ");
      screen.render();
      promptInput();
    });
});

inputBox.key(["escape"], () => {
  inputBox.cancel();
});

// ── Pipeline Initialization ─────────────────────────────────────────────────
createRagPipeline(config, {
  log: (msg) => {
    chatBox.log(`{grey-fg}${blessed.escape(msg)}{/}`);
    screen.render();
  },
})
  .then(async (rag) => {
    pipeline = rag;
    chatBox.log(`{grey-fg}RAG ready: ${await rag.chunkCount()} chunk(s) indexed{/}`);
    chatBox.log("");
    screen.render();
  })
  .catch((err: unknown) => {
    screen.destroy();
    exitOnError(err);
  });

screen.render();
promptInput();
