import { llmGemini, refine, type ExecutorFactory } from "../src/dual-agent.js";

const geminiKey = process.env.GEMINI_API_KEY;
if (!geminiKey) {
  console.error("Set GEMINI_API_KEY to run this example.");
  process.exit(1);
}

// An executor that answers in a message list instead of a single string
const critiqueThenRewrite: ExecutorFactory = ({ llmConfig }) => {
  const llm = llmGemini({ apiKey: llmConfig.apiKey, model: llmConfig.model, options: { temperature: llmConfig.temperature } });
  return {
    async invoke({ draft, topic }) {
      const critique = await llm.gen({
        systemPrompt: "Critique the draft in two sentences.",
        userContent: `Topic: ${topic}\n\nDraft: ${draft}`,
      });
      const rewrite = await llm.gen({
        systemPrompt: "Rewrite the draft so it addresses the critique.",
        userContent: `Draft: ${draft}`,
        history: [{ role: "assistant", content: critique }],
      });
      return { messages: [{ role: "assistant", content: critique }, { role: "assistant", content: rewrite }] };
    },
  };
};

const text = await refine(
  "Serverless is rising. Teams ship faster.",
  "The future of serverless computing",
  { apiKey: geminiKey, model: "gemini-2.5-flash", temperature: 0.7 },
  { enabled: false },
  { executor: critiqueThenRewrite }
);

console.log(text);
