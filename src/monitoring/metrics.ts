import client from 'prom-client';

// Collect default Node.js metrics (GC, event loop, memory)
client.collectDefaultMetrics();

export const pdusSent = new client.Counter({
  name: 'smpp_pdus_sent_total',
  help: 'Total PDUs sent to the SMSC',
  labelNames: ['command'] as const,
});

export const pdusReceived = new client.Counter({
  name: 'smpp_pdus_received_total',
  help: 'Total PDUs received from the SMSC',
  labelNames: ['command'] as const,
});

export const submitSmSent = new client.Counter({
  name: 'submit_sm_sent_total',
  help: 'Total submit_sm PDUs sent',
});

export const submitSmAcks = new client.Counter({
  name: 'submit_sm_acks_total',
  help: 'Total submit_sm acknowledgements matched to a pending request',
  labelNames: ['status'] as const,
});

export const unmatchedResponses = new client.Counter({
  name: 'smpp_unmatched_responses_total',
  help: 'Responses whose sequence number was not pending (late, duplicate or unknown)',
  labelNames: ['command'] as const,
});

export const requestTimeouts = new client.Counter({
  name: 'smpp_request_timeouts_total',
  help: 'Pending requests that expired without a response',
});

export const windowSize = new client.Gauge({
  name: 'smpp_window_size',
  help: 'Requests currently awaiting a response',
});

export const boundSessions = new client.Gauge({
  name: 'smpp_bound_sessions',
  help: 'Sessions currently in the bound state',
});

export const sessionTerminations = new client.Counter({
  name: 'smpp_session_terminations_total',
  help: 'Sessions that reached the terminated state',
  labelNames: ['reason'] as const,
});

export const metricsRegistry = client.register;
