/**
 * Centralized Assistant Messages
 *
 * Usage text shown by the help command and by the relevance gate when it
 * turns a query away.
 */

import { FORMAT_CONSTANTS } from "../config/constants";
import type { VocabularySnapshot } from "../vocabulary/vocabularyCache";

export const DEFAULT_HELP_PROMPT = [
  "This assistant strictly answers **Federal Register / U.S. regulatory** queries only.",
  "",
  "Try one of the following:",
  "• `search <keyword>`",
  "• `find <agency>`",
  "• `recent <N>`",
  "• `help`",
].join("\n");

/**
 * Rejection prompt for an out-of-domain query, with examples drawn from the
 * current vocabulary when there is any.
 */
export function getRejectionMessage(vocabulary: VocabularySnapshot): string {
  const examples = [
    ...vocabulary.keywords.slice(0, FORMAT_CONSTANTS.REJECTION_SUGGESTIONS).map(keyword => `• \`search ${keyword}\``),
    ...vocabulary.agencies.slice(0, 1).map(agency => `• \`find ${agency}\``),
  ];

  if (examples.length === 0) {
    return DEFAULT_HELP_PROMPT;
  }
  return `${DEFAULT_HELP_PROMPT}\n\nFor example:\n${examples.join("\n")}`;
}

function formatBulletList(items: readonly string[], indent = 4): string {
  if (items.length === 0) {
    return `${" ".repeat(indent)}• None indexed yet`;
  }
  return items.map(item => `${" ".repeat(indent)}• ${item}`).join("\n");
}

/**
 * Usage summary for the `help` command: commands, document totals, top
 * agencies and popular keywords from the vocabulary snapshot.
 */
export function formatHelpText(vocabulary: VocabularySnapshot): string {
  const topAgencies = vocabulary.agencies.slice(0, FORMAT_CONSTANTS.HELP_TOP_AGENCIES);
  const popularKeywords = vocabulary.keywords.slice(0, FORMAT_CONSTANTS.HELP_TOP_KEYWORDS);
  const latest = vocabulary.latestPublicationDate ?? "n/a";

  return `🔍 Federal Register Search Assistant

How to use:

1️⃣ Search by keyword
• \`search <keyword>\`
• Example: \`search pesticide\`
• Searches titles, abstracts, excerpts and full text for the keyword.

2️⃣ Find by agency
• \`find <agency>\`
• Example: \`find EPA\`
• Lists documents published by a specific agency.

3️⃣ Get recent documents
• \`recent <N>\`
• Example: \`recent 5\`
• Shows the N most recent documents across all agencies.

4️⃣ Show this help
• \`help\`
• Displays usage instructions, top agencies, and popular keywords.

⚠️ Important:
This assistant strictly answers Federal Register / U.S. regulatory queries only.
General questions or unrelated topics will not return results.

📊 Database: ${vocabulary.totalDocuments} documents, most recent publication ${latest}

Top agencies (sample):
${formatBulletList(topAgencies)}

Popular keywords (sample):
${formatBulletList(popularKeywords)}`;
}
