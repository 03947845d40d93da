/**
 * Fallback Handler
 *
 * Fixed reason-to-message mapping. Makes no external calls and cannot fail.
 */

import { FallbackReason } from '../routing/types';

export const FALLBACK_MESSAGES: Readonly<Record<FallbackReason, string>> = Object.freeze({
  [FallbackReason.NO_TOOL_FOUND]:
    "I'm sorry, I couldn't find the right resource to help with your question. Please try rephrasing your query or contact our support team for assistance.",
  [FallbackReason.LOW_CONFIDENCE]:
    "I'm not entirely sure I understand your question. Could you please provide more details or rephrase your request?",
  [FallbackReason.SERVICE_UNAVAILABLE]:
    "I'm currently experiencing technical difficulties. Please try again in a few moments or contact support if the issue persists.",
  [FallbackReason.TOOL_FAILURE]:
    "I wasn't able to complete your request because a required service did not respond. Please try again in a few moments.",
  [FallbackReason.CLARIFICATION_EXHAUSTED]:
    "I'm still not able to determine what you need. Please contact our support team so someone can help you directly.",
  [FallbackReason.CONVERSATIONAL]:
    "Hello! I'm here to help with your benefits, claims and documents. What can I assist you with today?",
  [FallbackReason.TRANSIENT_FAILURE]:
    'Your conversation was updated by another request. Please send your message again.',
});

/**
 * @param directResponse - Classifier reply, only used for conversational turns
 */
export function fallbackMessage(reason: FallbackReason, directResponse?: string): string {
  if (reason === FallbackReason.CONVERSATIONAL && directResponse && directResponse.trim().length > 0) {
    return directResponse.trim();
  }
  return FALLBACK_MESSAGES[reason];
}
