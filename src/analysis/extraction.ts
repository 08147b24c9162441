import { SchemaValidationError, UpstreamCapabilityError } from '../control-plane/errors.js';
import type { CapabilityId } from '../config/capabilities.js';
import type { Capability } from '../tools/capability.js';
import type { SourceDocument } from '../tools/documents.js';
import { ExtractedFactsSchema } from './schemas.js';
import type { ExtractedFacts, UsageCounters } from './schemas.js';
import { parseJsonPayload, validatePayload } from './schema-validator.js';
import { usageFromCall } from './usage.js';

export const ANALYST_SYSTEM_PROMPT =
  'You are a financial data extraction and analysis specialist. ' +
  'You report figures exactly as stated in the source and never estimate missing ones.';

const DELIMITER = '='.repeat(80);

const EXTRACTION_INSTRUCTIONS = `Extract the company's financial facts from the statement text below.

Return ONLY a JSON object with these keys (camelCase, numbers as plain JSON numbers in the statement's reporting unit):
- companyName, fiscalYear, periodEnd, currency (strings)
- revenue: { "current": number, "previous": number }
- netIncome, netIncomePrevious, eps, sharesOutstanding, bookValuePerShare
- shareholdersEquity, totalAssets, totalLiabilities, currentAssets, currentLiabilities, cash, totalDebt, accountsReceivable
- cogs, operatingIncome, interestExpense, ebitda
- operatingCashFlow, capitalExpenditures, freeCashFlow, dividendsPaid
- beginningCash, netChangeCash, endingCash, cashFlowNetIncome
- segments: [{ "name": string, "revenue": number, "operatingIncome": number }] as reported in the segment note
- otherIncome: [{ "label": string, "amount": number }] for each itemized other-income line
- businessModel: [{ "name": string, "description": string }]
- investorStatements: [string] quoted management statements relevant to investors

Rules:
1. Use null for any value the document does not state. Never use 0 or an empty string as a placeholder.
2. Do not calculate or estimate values; copy them as stated.
3. Use [] for segments or otherIncome when the document has no such breakdown.
4. Search every section: income statement, balance sheet, cash flow statement and notes.`;

export function buildExtractionPrompt(document: SourceDocument): string {
  let priceLine = '';
  if (document.price !== null) {
    const price = document.price.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
    priceLine = `\n\nCurrent stock price: ${document.currency ? `${document.currency} ` : ''}${price}`;
  }

  return [
    `${EXTRACTION_INSTRUCTIONS}${priceLine}`,
    '',
    DELIMITER,
    'STATEMENT TEXT',
    DELIMITER,
    document.text,
    DELIMITER,
    'END OF STATEMENT TEXT',
    DELIMITER,
    '',
    'Return the JSON object now.',
  ].join('\n');
}

export interface ExtractionOutcome {
  facts: ExtractedFacts;
  usage: UsageCounters;
}

export async function extractFacts(
  capability: Capability,
  capabilityId: CapabilityId,
  document: SourceDocument,
  signal?: AbortSignal
): Promise<ExtractionOutcome> {
  const response = await capability
    .invoke({
      capability: capabilityId,
      system: ANALYST_SYSTEM_PROMPT,
      prompt: buildExtractionPrompt(document),
      signal,
    })
    .catch((error: unknown) => {
      if (error instanceof UpstreamCapabilityError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new UpstreamCapabilityError(`extraction via ${capabilityId} failed: ${message}`, { cause: error });
    });

  const usage = usageFromCall(capabilityId, response.tokens);

  const json = parseJsonPayload(response.content, 'extraction');
  if (!json.ok) {
    json.error.usage = usage;
    throw json.error;
  }

  const facts = validatePayload(ExtractedFactsSchema, json.value, 'extraction');
  if (!facts.ok) {
    throw new SchemaValidationError(facts.error.message, facts.error.issues, usage);
  }

  return { facts: facts.value, usage };
}
