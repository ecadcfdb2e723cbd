/**
 * Result Formatter
 *
 * Renders lookup results as a markdown report grouped by topic. Each record
 * shows title, publication date, agencies and a summary cut to the summary
 * budget. Topic groups appear in order of first appearance, with "Other"
 * always last.
 */

import type { DocumentWithAgencies } from "@shared/schema";
import { FORMAT_CONSTANTS } from "../config/constants";
import { OTHER_TOPIC, TOPIC_RULES } from "../config/topics";
import { tokenize, truncateChars } from "../utils/text";

export const NO_RESULTS_MESSAGE = "No relevant regulations found.";
export const RESULTS_HEADER = "# 📚 Federal Register Search Results";
export const RESULTS_FOOTER = "---\n*Use `help` for search tips.*";

const UNKNOWN_AGENCY = "Unknown";
const UNKNOWN_DATE = "Unknown";
const UNTITLED = "(No title)";
const NO_SUMMARY = "No summary available.";

export type FormattedRecord = {
  title: string;
  date: string;
  agencies: string[];
  summary: string;
};

export type TopicGroup = {
  topic: string;
  records: FormattedRecord[];
};

export function topicForTitle(title: string | null | undefined): string {
  const tokens = new Set(tokenize(title));
  for (const rule of TOPIC_RULES) {
    if (rule.keywords.some(keyword => tokens.has(keyword))) {
      return rule.topic;
    }
  }
  return OTHER_TOPIC;
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function formatRecord(doc: DocumentWithAgencies): FormattedRecord {
  const summarySource = collapseWhitespace(doc.excerpt || doc.abstract || "");

  return {
    title: collapseWhitespace(doc.title || "") || doc.id || UNTITLED,
    date: doc.publicationDate || UNKNOWN_DATE,
    agencies: doc.agencyNames.filter(name => name.trim().length > 0),
    summary: summarySource ? truncateChars(summarySource, FORMAT_CONSTANTS.SUMMARY_MAX_CHARS) : NO_SUMMARY,
  };
}

export function groupByTopic(docs: readonly DocumentWithAgencies[]): TopicGroup[] {
  const groups = new Map<string, FormattedRecord[]>();
  for (const doc of docs) {
    const topic = topicForTitle(doc.title);
    const records = groups.get(topic) ?? [];
    records.push(formatRecord(doc));
    groups.set(topic, records);
  }

  const ordered: TopicGroup[] = [];
  let other: TopicGroup | null = null;
  for (const [topic, records] of Array.from(groups.entries())) {
    if (topic === OTHER_TOPIC) {
      other = { topic, records };
    } else {
      ordered.push({ topic, records });
    }
  }
  if (other) ordered.push(other);
  return ordered;
}

function renderRecord(record: FormattedRecord): string {
  const agencies = record.agencies.length > 0 ? record.agencies.join(", ") : UNKNOWN_AGENCY;
  return [
    `### ${record.title}`,
    `📅 **Date**: ${record.date}`,
    `🏛️ **Agencies**: ${agencies}`,
    `📝 **Summary**: ${record.summary}`,
  ].join("\n");
}

/**
 * Render documents as a grouped markdown report.
 *
 * @param subtitle - Optional line under the header describing the lookup
 */
export function formatResults(docs: readonly DocumentWithAgencies[], subtitle?: string): string {
  if (docs.length === 0) {
    return NO_RESULTS_MESSAGE;
  }

  const sections: string[] = [RESULTS_HEADER];
  if (subtitle) {
    sections.push(`*${subtitle}*`);
  }
  for (const group of groupByTopic(docs)) {
    sections.push(`## 🗂️ ${group.topic}`);
    for (const record of group.records) {
      sections.push(renderRecord(record));
    }
  }
  sections.push(RESULTS_FOOTER);
  return sections.join("\n\n");
}
