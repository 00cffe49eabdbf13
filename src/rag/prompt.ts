export function buildGroundedPrompt(question: string, contextAnswer: string): string {
  return [
    "You are a helpful FAQ assistant. Treat the context answer below as trusted ground truth when responding to the user's question.",
    "If the context does not cover the question, say you are unsure and ask the user to rephrase.",
    "",
    `Context answer: ${contextAnswer}`,
    `User question: ${question}`,
    "",
    "Respond in 2-3 friendly sentences."
  ].join("\n");
}
