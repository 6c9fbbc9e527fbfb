import { CatalogItem } from '../catalog/types';

/**
 * Fixed assistant replies. Anything with a session id or inquiry id is built
 * by a function so the reference always appears verbatim.
 */
export const REPLIES = {
  notUnderstood:
    "Sorry, I didn't quite understand that. Would you like me to connect you with a member of our team? (yes/no)",
  moreHelp: 'Is there anything else I can help you with? I can answer questions about our products or the store.',
  knowledgeFallback:
    "I don't have that information at hand. Please contact the store directly and our staff will be happy to help.",
  catalogNotFound: "Sorry, I couldn't find any products matching your request. Could you try a different product name?",
  unavailable: "Sorry, I can't look that up right now because the service is temporarily unavailable. Please try again in a moment.",
  askName: "I'll connect you with a member of our team. First, could you tell me your name?",
  askNameAgain: 'Could you tell me your name so our team knows who to contact?',
  askEmailAgain: "That doesn't look like a valid email address. Could you send it again? (for example name@example.com)",
} as const;

export function askEmail(name: string): string {
  return `Thanks, ${name}! What email address can our team reach you at?`;
}

export function handoffConfirmation(name: string, email: string, inquiryId: string, sessionId: string): string {
  return (
    `Thank you, ${name}! Your inquiry has been registered (ID: ${inquiryId}). ` +
    `A member of our team will contact you at ${email} within 24-48 hours. ` +
    `Your session reference is ${sessionId}.`
  );
}

export function alreadyHandedOff(inquiryId: string | null, sessionId: string): string {
  const reference = inquiryId ? ` (ID: ${inquiryId})` : '';
  return `Your inquiry${reference} is with our team and they will contact you soon. Your session reference is ${sessionId}.`;
}

export function sessionEnded(sessionId: string): string {
  return `This conversation has ended. Please start a new chat if you need anything else. Session reference: ${sessionId}.`;
}

export function goodbye(sessionId: string): string {
  return `Thanks for chatting with us. Goodbye! Your session reference is ${sessionId}.`;
}

export function formatPrice(price: number): string {
  return price.toFixed(2);
}

export function catalogItemsReply(items: CatalogItem[]): string {
  const lines = items.map((item) => {
    const stock = item.stock > 0 ? `${item.stock} in stock` : 'out of stock';
    return `- ${item.name}: $${formatPrice(item.price)} (${stock})`;
  });
  return ['Here is what I found:', ...lines].join('\n');
}
