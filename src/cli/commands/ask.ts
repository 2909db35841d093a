import { answerOptionsFrom, answerQuestion } from "../../rag/answer.js";
import { openStore, type Services } from "../../rag/services.js";

export async function runAskCommand(question: string, services: Services): Promise<void> {
  if (!question.trim()) {
    throw new Error("Usage: citewise ask <question>");
  }

  const store = await openStore(services);
  const result = await answerQuestion({
    question,
    searcher: store,
    generation: services.generation,
    options: answerOptionsFrom(services.settings),
    logger: services.logger
  });
  process.stdout.write(`${result.answer}\n`);
}
