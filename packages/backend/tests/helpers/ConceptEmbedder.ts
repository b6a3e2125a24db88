import type { EmbeddingProvider } from "../../src/services/llmTypes.js";

/** One dimension per concept; a text scores the number of its words that name the concept. */
export const concepts: Record<string, string[]> = {
  offering: ["services", "service", "solutions", "solution", "offer", "offers", "products"],
  pricing: ["pricing", "price", "prices", "cost", "costs", "euros", "tariff"],
  office: ["office", "offices", "address", "located"],
  careers: ["careers", "vacancies", "jobs", "hiring"],
  ml: ["machine", "learning", "models"]
};

const conceptNames = Object.keys(concepts);

export class ConceptEmbedder implements EmbeddingProvider {
  calls: string[] = [];
  failWith: Error | null = null;
  delayMs = 0;

  async generateEmbedding(text: string): Promise<number[]> {
    this.calls.push(text);
    if (this.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }
    if (this.failWith) {
      throw this.failWith;
    }

    const words = text.toLowerCase().split(/[^\p{L}\p{N}]+/u);
    return conceptNames.map((name) => {
      const synonyms = concepts[name] ?? [];
      return words.filter((word) => synonyms.includes(word)).length;
    });
  }
}
