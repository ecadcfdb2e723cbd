/**
 * Topic labels for grouping search results.
 *
 * Checked in order; the first topic with a keyword among the title's tokens
 * wins. Titles matching nothing land in OTHER_TOPIC.
 */

export type TopicRule = {
  topic: string;
  keywords: readonly string[];
};

export const OTHER_TOPIC = "Other";

export const TOPIC_RULES: readonly TopicRule[] = [
  { topic: "Environment", keywords: ["environment", "environmental", "pollution", "pollutant", "pollutants", "emissions", "waste", "water"] },
  { topic: "Air Quality", keywords: ["air", "ozone", "particulate"] },
  { topic: "Energy", keywords: ["energy", "electric", "nuclear", "pipeline", "gas", "oil"] },
  { topic: "Health", keywords: ["health", "drug", "drugs", "medical", "device", "devices", "food"] },
  { topic: "Healthcare", keywords: ["medicare", "medicaid", "hospital", "healthcare"] },
  { topic: "Trade", keywords: ["trade", "import", "imports", "export", "exports", "tariff", "antidumping"] },
  { topic: "Finance", keywords: ["finance", "financial", "securities", "banking", "investment"] },
  { topic: "Tax", keywords: ["tax", "taxes", "revenue"] },
  { topic: "Pesticide", keywords: ["pesticide", "pesticides", "tolerance", "tolerances"] },
];
