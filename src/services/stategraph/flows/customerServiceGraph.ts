import { z } from 'zod';
import { compileCondition, whenState } from '../conditions';
import { confidenceSchema, type FieldSpec } from '../fieldMapping';
import type { StateGraph } from '../graph';
import { GraphBuilder } from '../graphBuilder';
import { isPlainRecord } from '../outputParser';
import { resultKey, userInputKey, type NodeContext, type StateSnapshot } from '../types';

export const CUSTOMER_SERVICE_GRAPH = 'customer_service';

export type Priority = 'high' | 'medium' | 'low';

export const SERVICES = [
  'Order status',
  'Refunds and returns',
  'Product questions',
  'Technical support',
  'Complaints',
  'Account access',
] as const;

const SERVICE_KEYWORDS: Record<string, string[]> = {
  'Order status': ['order', 'status', 'delivery', 'shipping'],
  'Refunds and returns': ['refund', 'return'],
  'Product questions': ['product', 'price', 'feature'],
  'Technical support': ['error', 'bug', 'crash', 'technical'],
  Complaints: ['complaint', 'unhappy', 'feedback'],
  'Account access': ['account', 'login', 'password'],
};

const SERVICE_PRIORITY: Record<string, Priority> = {
  'Order status': 'medium',
  'Refunds and returns': 'high',
  'Product questions': 'low',
  'Technical support': 'medium',
  Complaints: 'high',
  'Account access': 'medium',
};

const PRIORITY_DESCRIPTIONS: Record<Priority, string> = {
  high: 'handled first, reply within 5 minutes',
  medium: 'normal queue, reply within 15 minutes',
  low: 'handled in order, reply within 30 minutes',
};

const HUMAN_SERVICES = new Set(['Refunds and returns', 'Complaints']);
const URGENT_WORDS = ['urgent', 'asap', 'immediately', 'emergency'];
const CLICK_PATTERNS = ['click', 'select', 'menu', 'button', 'booking', 'order', 'help', 'contact'];
const CHAT_PATTERNS = ['i want', 'please', 'how', 'why', 'when', 'can you', 'could', 'need'];

const INTENT_KEYWORDS: Record<string, string[]> = {
  product_inquiry: ['product', 'feature', 'price'],
  refund_request: ['refund', 'money back'],
  technical_support: ['error', 'crash', 'broken'],
  complaint: ['complaint', 'unhappy', 'terrible'],
};

const ANSWERS: Record<string, { answer: string; confidence: number }> = {
  general_inquiry: {
    answer: 'Thanks for reaching out. Our help centre covers most common questions.',
    confidence: 0.6,
  },
  product_inquiry: {
    answer: 'Full specifications and prices are listed on each product page.',
    confidence: 0.8,
  },
  refund_request: {
    answer: 'Refunds are issued to the original payment method within 5 business days.',
    confidence: 0.85,
  },
  technical_support: {
    answer: 'Please restart the app and update to the latest version.',
    confidence: 0.7,
  },
  complaint: {
    answer: 'We are sorry to hear that. A summary of your feedback has been logged.',
    confidence: 0.65,
  },
};

export const customerServiceFieldMapping: FieldSpec[] = [
  { source: 'query', target: 'query', schema: z.string() },
  { source: 'event_type', target: 'event_type', schema: z.enum(['click', 'chat']) },
  { source: 'confidence', target: 'confidence', schema: confidenceSchema, defaultValue: 0 },
  { source: 'stage', target: 'stage', defaultFromNode: (nodeId) => nodeId, fillWhenMissing: true },
  { source: 'status', target: 'status', defaultValue: 'Success', fillWhenMissing: true },
  { source: 'service_type', target: 'service_type', schema: z.string().min(1) },
  { source: 'requires_human', target: 'requires_human', schema: z.boolean(), defaultValue: false },
  {
    source: 'priority',
    target: 'priority_level',
    schema: z.enum(['high', 'medium', 'low']),
    defaultValue: 'medium',
  },
  { source: 'intent', target: 'intent' },
  { source: 'answer', target: 'answer' },
];

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function countMatches(text: string, patterns: readonly string[]): number {
  return patterns.filter((pattern) => text.includes(pattern)).length;
}

function readString(state: StateSnapshot, field: string): string {
  const value = state[field];
  return typeof value === 'string' ? value : '';
}

function readUserInput(state: StateSnapshot, nodeId: string): string {
  const record = state[userInputKey(nodeId)];
  return isPlainRecord(record) && typeof record.input === 'string' ? record.input : '';
}

export function classifyEvent(query: string): { event_type: 'click' | 'chat'; confidence: number } {
  const text = query.toLowerCase();
  const clicks = countMatches(text, CLICK_PATTERNS);
  const chats = countMatches(text, CHAT_PATTERNS);

  if (query.length < 10 && clicks > 0) {
    return { event_type: 'click', confidence: round2(0.8 + Math.min(clicks * 0.1, 0.2)) };
  }
  if (query.length > 20 && chats > clicks) {
    return { event_type: 'chat', confidence: round2(0.7 + Math.min(chats * 0.1, 0.3)) };
  }
  if (clicks > chats) {
    return { event_type: 'click', confidence: round2(0.6 + Math.min(clicks * 0.1, 0.3)) };
  }
  return { event_type: 'chat', confidence: round2(0.6 + Math.min(chats * 0.1, 0.3)) };
}

/** Services matching the query first (best match first), padded with up to three others. */
export function rankServices(query: string): string[] {
  const text = query.toLowerCase();
  const scored = SERVICES.map((service) => ({
    service,
    score: countMatches(text, SERVICE_KEYWORDS[service] ?? []),
  })).filter((entry) => entry.score > 0);

  if (scored.length === 0) return [...SERVICES];

  const recommended = [...scored]
    .sort((a, b) => b.score - a.score)
    .slice(0, 3)
    .map((entry) => entry.service);
  const others = SERVICES.filter((service) => !recommended.includes(service)).slice(0, 3);
  return [...recommended, ...others];
}

export function suggestPriority(service: string, query: string): Priority {
  const text = query.toLowerCase();
  if (URGENT_WORDS.some((word) => text.includes(word))) return 'high';
  return SERVICE_PRIORITY[service] ?? 'medium';
}

function priorityOption(priority: Priority): string {
  const label = priority.charAt(0).toUpperCase() + priority.slice(1);
  return `${label} priority - ${PRIORITY_DESCRIPTIONS[priority]}`;
}

/** Priority picked from one of the options offered by `priority_confirmer`. */
export function parsePriorityChoice(choice: string, suggested: Priority): Priority {
  const text = choice.toLowerCase();
  if (text.startsWith('confirm')) return suggested;
  if (text.startsWith('high')) return 'high';
  if (text.startsWith('low')) return 'low';
  if (text.startsWith('medium')) return 'medium';
  return suggested;
}

export function classifyIntent(query: string): string {
  const text = query.toLowerCase();
  let best = 'general_inquiry';
  let bestScore = 0;
  for (const [intent, keywords] of Object.entries(INTENT_KEYWORDS)) {
    const score = countMatches(text, keywords);
    if (score > bestScore) {
      best = intent;
      bestScore = score;
    }
  }
  return best;
}

function entryAgent({ input }: NodeContext): string {
  const query = typeof input === 'string' ? input.trim() : '';
  const classification = classifyEvent(query);
  return `Classified the incoming event.\n${JSON.stringify({
    query,
    ...classification,
    stage: 'entry_agent',
    status: 'Success',
  })}`;
}

function serviceSelector({ state }: NodeContext) {
  const options = rankServices(readString(state, 'query'));
  return {
    message: 'Which service do you need help with?',
    options,
  };
}

function priorityConfirmer({ state }: NodeContext) {
  const service = readUserInput(state, 'service_selector');
  const suggested = suggestPriority(service, readString(state, 'query'));
  return {
    message: `For "${service}" we suggest ${suggested} priority. Confirm or pick another level.`,
    service_type: service,
    suggested_priority: suggested,
    options: [
      `Confirm - ${priorityOption(suggested)}`,
      priorityOption('high'),
      priorityOption('medium'),
      priorityOption('low'),
    ],
  };
}

function routeAgent({ state }: NodeContext) {
  const query = readString(state, 'query').toLowerCase();
  const service = readString(state, 'service_type');
  const confirmer = state[resultKey('priority_confirmer')];
  const suggested =
    isPlainRecord(confirmer) && typeof confirmer.suggested_priority === 'string'
      ? parsePriorityChoice(confirmer.suggested_priority, 'medium')
      : 'medium';
  const choice = readUserInput(state, 'priority_confirmer');
  const priority = choice ? parsePriorityChoice(choice, suggested) : suggested;

  const requiresHuman =
    priority === 'high' ||
    HUMAN_SERVICES.has(service) ||
    ['refund', 'complaint', 'manager'].some((word) => query.includes(word));

  return { requires_human: requiresHuman, priority };
}

function transferAgent({ state }: NodeContext) {
  const query = readString(state, 'query').toLowerCase();
  const priority = state.priority_level === 'high' ? 'high' : 'medium';
  const messageType = query.includes('refund')
    ? 'refund'
    : query.includes('complaint')
      ? 'complaint'
      : 'general';
  return {
    message: 'Connecting you to a member of our support team.',
    message_type: messageType,
    priority,
    wait_time: priority === 'high' ? '2-5 minutes' : '5-10 minutes',
  };
}

function intentAgent({ state }: NodeContext) {
  return { intent: classifyIntent(readString(state, 'query')), confidence: 0.75 };
}

function answerAgent({ state }: NodeContext) {
  const intent = readString(state, 'intent') || 'general_inquiry';
  return ANSWERS[intent] ?? ANSWERS.general_inquiry;
}

/**
 * Customer-service flow: classify the entry event, let clicks pick a service
 * and confirm a priority, then route to a human or answer automatically.
 */
export function buildCustomerServiceGraph(): StateGraph {
  const builder = new GraphBuilder({
    name: CUSTOMER_SERVICE_GRAPH,
    fieldMapping: customerServiceFieldMapping,
  });

  const entry = builder.addNode('entry_agent', entryAgent, 'Classify click or chat event');
  const selector = builder.addNode('service_selector', serviceSelector, 'Offer service types');
  const confirmer = builder.addNode('priority_confirmer', priorityConfirmer, 'Confirm priority');
  const route = builder.addNode('route_agent', routeAgent, 'Decide human or automatic handling');
  const transfer = builder.addNode('transfer_agent', transferAgent, 'Hand over to a human');
  const intent = builder.addNode('intent_agent', intentAgent, 'Classify intent');
  const answer = builder.addNode('answer_agent', answerAgent, 'Answer from the knowledge base');

  builder.addEdge(
    entry,
    selector,
    compileCondition({
      logic: 'and',
      conditions: [
        { field: 'stage', operator: 'eq', value: 'entry_agent' },
        { field: 'status', operator: 'eq', value: 'Success' },
        { field: 'event_type', operator: 'eq', value: 'click' },
      ],
    }),
    { label: 'click' },
  );
  builder.addEdge(
    entry,
    route,
    whenState({ stage: 'entry_agent', status: 'Success', event_type: 'chat' }),
    { label: 'chat' },
  );
  builder.addEdge(
    selector,
    confirmer,
    whenState({ stage: 'service_selector', status: 'Success' }),
    { requiresUserInput: true, label: 'service selected' },
  );
  builder.addEdge(
    confirmer,
    route,
    whenState({ stage: 'priority_confirmer', status: 'Success' }),
    { requiresUserInput: true, label: 'priority confirmed' },
  );
  builder.addEdge(
    route,
    transfer,
    whenState({ stage: 'route_agent', status: 'Success', requires_human: true }),
    { label: 'human' },
  );
  builder.addEdge(
    route,
    intent,
    whenState({ stage: 'route_agent', status: 'Success', requires_human: false }),
    { label: 'automatic' },
  );
  builder.addEdge(intent, answer);

  return builder.setEntryPoint(entry).build();
}
