const DOMAIN_LABELS: Record<string, string> = {
  location: 'campus locations',
  event_info: 'dates and opening times',
  course_info: 'courses and entry requirements',
  fees_funding: 'fees and funding',
  accommodation: 'accommodation halls',
  it_support: 'IT support',
  library: 'the library',
};

export function domainLabel(domain: string): string {
  return DOMAIN_LABELS[domain] ?? domain.replace(/_/g, ' ');
}

export const UNDETERMINED_MESSAGE =
  "I'm not sure what you're asking about yet. Could you add a little more detail, for example the hall, course or building you mean?";

export function unsupportedMessage(domain: string, supported: readonly string[]): string {
  const supportedText = supported.length > 0 ? supported.map(domainLabel).join(', ') : 'nothing yet';
  return `That looks like a question about ${domainLabel(domain)}. I can only answer questions about ${supportedText} at the moment.`;
}

export const NO_DATA_MESSAGE = "I haven't found anything on that yet because no records are loaded. Please try again later.";
