import type { SessionTurn } from "@siteqa/shared";

export interface OrganizationProfile {
  name: string;
  profile: string;
}

export function formatHistory(history: readonly SessionTurn[]): string {
  if (history.length === 0) {
    return "(no previous turns)";
  }
  return history.map((turn) => `User: ${turn.question}\nAssistant: ${turn.answer}`).join("\n\n");
}

export function buildClassificationSystemPrompt(organization: OrganizationProfile): string {
  const profile = organization.profile.trim()
    ? `\nAbout ${organization.name}: ${organization.profile.trim()}\n`
    : "";

  return `
You classify questions sent to the website assistant of ${organization.name}.
${profile}
Label a question "in_domain" when it concerns ${organization.name}: its services, solutions or products,
clients and projects, offices and contacts, pricing, careers and vacancies, expertise and technologies,
or when it follows up on an earlier in-domain turn of the conversation (for example "And in euros?").

Label it "off_domain" for greetings and small talk, general knowledge, other companies, and anything
unrelated to ${organization.name}. If you cannot decide, use "unknown".

Reply with JSON only:
{"label": "in_domain" | "off_domain" | "unknown", "confidence": <number between 0 and 1>, "reason": "<short explanation>"}
`.trim();
}

export function buildClassificationUserPrompt(question: string, history: readonly SessionTurn[]): string {
  return `
Conversation so far:
${formatHistory(history)}

Question to classify: ${question}
`.trim();
}
