import type { SearchResultItem } from './interfaces/search-provider.interface';

export enum SignalTopic {
  FUNDING = 'funding',
  HIRING = 'hiring',
  TECH_STACK = 'tech_stack',
}

/** Fixed and exhaustive; bundle keys always follow this order. */
export const SIGNAL_TOPICS: readonly SignalTopic[] = [
  SignalTopic.FUNDING,
  SignalTopic.HIRING,
  SignalTopic.TECH_STACK,
];

export const SIGNAL_QUERY_TEMPLATES: Record<SignalTopic, (domain: string) => string> = {
  [SignalTopic.FUNDING]: (domain) => `When was ${domain} last funding round?`,
  [SignalTopic.HIRING]: (domain) => `Is ${domain} hiring for sales roles?`,
  [SignalTopic.TECH_STACK]: (domain) => `What tech stack does ${domain} use?`,
};

export type SignalBundle = Record<SignalTopic, SearchResultItem[]>;

export function buildSignalQueries(domain: string): Record<SignalTopic, string> {
  return {
    [SignalTopic.FUNDING]: SIGNAL_QUERY_TEMPLATES[SignalTopic.FUNDING](domain),
    [SignalTopic.HIRING]: SIGNAL_QUERY_TEMPLATES[SignalTopic.HIRING](domain),
    [SignalTopic.TECH_STACK]: SIGNAL_QUERY_TEMPLATES[SignalTopic.TECH_STACK](domain),
  };
}

export function countSignals(bundle: SignalBundle): number {
  return SIGNAL_TOPICS.reduce((total, topic) => total + bundle[topic].length, 0);
}
