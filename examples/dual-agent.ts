import { runDualAgents, renderOutcome, createLogger } from "../src/dual-agent.js";

const groqKey = process.env.GROQ_API_KEY;
const geminiKey = process.env.GEMINI_API_KEY;
const tavilyKey = process.env.TAVILY_API_KEY;

if (!groqKey || !geminiKey) {
  console.error("Set GROQ_API_KEY and GEMINI_API_KEY to run this example.");
  process.exit(1);
}

const topic = process.argv[2] || "The future of serverless computing";

const outcome = await runDualAgents(
  topic,
  { apiKey: groqKey, model: "llama-3.1-8b-instant", temperature: 0.3 },
  { apiKey: geminiKey, model: "gemini-2.5-flash", temperature: 0.7 },
  {
    search: { enabled: Boolean(tavilyKey), apiKey: tavilyKey },
    logger: createLogger({ debug: true }),
  }
);

console.log("\n=== Reactive draft ===\n" + renderOutcome("Reactive", outcome.draft));
console.log("\n=== Proactive refinement ===\n" + renderOutcome("Proactive", outcome.refined));
