import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import { SessionSchema, type SessionConfig, type SessionConfigInput } from '../config/schema.js';
import { CommandStatus, describeStatus } from '../protocol/command-status.js';
import { commandName, isBindResp, type OutboundPdu, type Pdu } from '../protocol/pdu.js';
import {
  buildBindPdu,
  buildDeliverSmResp,
  buildEnquireLink,
  buildEnquireLinkResp,
  buildGenericNack,
  buildSubmitSm,
  buildUnbind,
  buildUnbindResp,
  toReceiveMessage,
  toSubmitResult,
} from '../protocol/translator.js';
import { SmppTransport } from '../transport/smpp-transport.js';
import { formatEndpoint, type PduConnection, type PduTransport } from '../transport/types.js';
import { SequenceNumberGenerator } from '../utils/sequence-generator.js';
import { logger, maskAddress } from '../monitoring/logger.js';
import * as metrics from '../monitoring/metrics.js';
import type { Bind, ReceiveMessage, SendMessage, SendMessageAck } from './commands.js';
import {
  AlreadyBoundError,
  BindFailedError,
  ConnectionFailedError,
  SessionClosedError,
} from './errors.js';
import { KeepaliveScheduler } from './keepalive.js';
import { ResponseWatcher, type Requester } from './response-watcher.js';
import { PendingWindow } from './window.js';

export type SessionState = 'connecting' | 'awaiting_bind' | 'binding' | 'bound' | 'terminated';

export type SmppClientEvents = {
  state: [state: SessionState];
  bound: [];
  message: [message: ReceiveMessage];
  terminated: [reason: Error];
};

type Command =
  | { kind: 'bind'; bind: Bind; requester: Requester<void> }
  | { kind: 'send_message'; message: SendMessage; requester: Requester<SendMessageAck> }
  | { kind: 'send_enquire_link' }
  | { kind: 'close'; requester: Requester<void> };

type SessionEvent =
  | { type: 'connected'; connection: PduConnection }
  | { type: 'connect_failed'; error: Error }
  | { type: 'transport_closed'; error?: Error }
  | { type: 'pdu'; pdu: Pdu }
  | { type: 'command'; command: Command }
  | { type: 'expired'; sequenceNumbers: number[] };

type TerminationReason = 'connect_failed' | 'bind_failed' | 'transport_lost' | 'peer_unbind' | 'closed';

/**
 * Client (ESME) side of one SMPP session.
 *
 * Every input (transport activity, caller commands, keepalive ticks and
 * request expiries) goes through a single mailbox and is handled one event
 * at a time, so state, window and sequence numbers are only ever touched
 * from dispatch(). Commands that arrive before the bind completes are held
 * in FIFO order and replayed once bound.
 */
export class SmppClient extends EventEmitter<SmppClientEvents> {
  private readonly config: SessionConfig;
  private readonly endpointName: string;
  private readonly log: Logger;

  private readonly window = new PendingWindow<ResponseWatcher>();
  private readonly sequence = new SequenceNumberGenerator(seq => this.window.has(seq));
  private readonly keepalive = new KeepaliveScheduler();
  private readonly stash: Command[] = [];
  private readonly mailbox: SessionEvent[] = [];

  private current: SessionState = 'connecting';
  private started = false;
  private processing = false;
  private connection: PduConnection | null = null;
  private connectTimer: ReturnType<typeof setTimeout> | null = null;
  private connectAbort: AbortController | null = null;
  private pendingBind: Requester<void> | null = null;
  private terminalError: Error | null = null;

  constructor(
    options: SessionConfigInput,
    private readonly transport: PduTransport = new SmppTransport(),
  ) {
    super();
    this.config = SessionSchema.parse(options);
    this.endpointName = formatEndpoint(this.config.endpoint);
    this.log = logger.child({ endpoint: this.endpointName });
  }

  get state(): SessionState {
    return this.current;
  }

  /** Outstanding submit_sm requests. */
  get pendingRequests(): number {
    return this.window.size;
  }

  /** Open the transport connection. Calling it again has no effect. */
  start(): void {
    if (this.started || this.current === 'terminated') return;
    this.started = true;

    this.log.debug({ timeoutMs: this.config.connectTimeoutMs }, 'Connecting to SMSC');

    this.connectTimer = setTimeout(() => {
      this.connectTimer = null;
      this.enqueue({
        type: 'connect_failed',
        error: new Error(`Connect timed out after ${this.config.connectTimeoutMs}ms`),
      });
    }, this.config.connectTimeoutMs);
    this.connectTimer.unref();
    this.connectAbort = new AbortController();

    void this.transport
      .connect(
        this.config.endpoint,
        {
          onPdu: pdu => this.enqueue({ type: 'pdu', pdu }),
          onClose: error => this.enqueue({ type: 'transport_closed', error }),
        },
        this.connectAbort.signal,
      )
      .then(
        connection => this.enqueue({ type: 'connected', connection }),
        (error: unknown) => this.enqueue({ type: 'connect_failed', error: toError(error) }),
      );
  }

  /** Resolves once bound. Rejects with BindFailedError if the SMSC refuses. */
  bind(bind: Bind): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.enqueue({ type: 'command', command: { kind: 'bind', bind, requester: { resolve, reject } } });
    });
  }

  /** Resolves with the SMSC's acknowledgement of the submit_sm. */
  sendMessage(message: SendMessage): Promise<SendMessageAck> {
    return new Promise<SendMessageAck>((resolve, reject) => {
      this.enqueue({ type: 'command', command: { kind: 'send_message', message, requester: { resolve, reject } } });
    });
  }

  /** Unbind (when bound) and close the transport. Resolves once terminated. */
  close(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.enqueue({ type: 'command', command: { kind: 'close', requester: { resolve, reject } } });
    });
  }

  // ── Mailbox ─────────────────────────────────────────────────────

  private enqueue(event: SessionEvent): void {
    this.mailbox.push(event);
    if (this.processing) return;

    this.processing = true;
    try {
      let next = this.mailbox.shift();
      while (next) {
        try {
          this.dispatch(next);
        } catch (err) {
          this.log.error({ event: next.type, error: toError(err).message }, 'Session event handler failed');
        }
        next = this.mailbox.shift();
      }
    } finally {
      this.processing = false;
    }
  }

  private dispatch(event: SessionEvent): void {
    switch (event.type) {
      case 'connected':
        return this.onConnected(event.connection);
      case 'connect_failed':
        return this.onConnectFailed(event.error);
      case 'transport_closed':
        return this.onTransportClosed(event.error);
      case 'pdu':
        return this.onPdu(event.pdu);
      case 'command':
        return this.runCommand(event.command);
      case 'expired':
        return this.onExpired(event.sequenceNumbers);
    }
  }

  // ── Transport events ────────────────────────────────────────────

  private onConnected(connection: PduConnection): void {
    if (this.current !== 'connecting') {
      // Timed out or closed while the connect was in flight
      connection.close();
      return;
    }
    this.clearConnectTimer();
    this.connectAbort = null;
    this.connection = connection;
    this.log.info('Connection established');
    this.transition('awaiting_bind');
    this.notifyState('awaiting_bind');
    this.replayStash();
  }

  private onConnectFailed(error: Error): void {
    if (this.current !== 'connecting') return;
    this.log.error({ error: error.message }, 'Network connection failed');
    this.terminate(
      new SessionClosedError('Session closed: connection failed', new ConnectionFailedError(this.endpointName, error)),
      'connect_failed',
    );
  }

  private onTransportClosed(error?: Error): void {
    if (this.current === 'terminated') return;
    this.connection = null;
    this.log.warn({ error: error?.message, state: this.current }, 'Connection lost');
    this.terminate(new SessionClosedError('Session closed: connection lost', error), 'transport_lost');
  }

  private onPdu(pdu: Pdu): void {
    metrics.pdusReceived.inc({ command: commandName(pdu) });

    switch (this.current) {
      case 'binding':
        return this.onBindingPdu(pdu);
      case 'bound':
        return this.onBoundPdu(pdu);
      case 'terminated':
        return;
      default:
        this.log.info({ command: commandName(pdu), seq: pdu.sequence_number, state: this.current }, 'Ignoring PDU before bind');
    }
  }

  private onBindingPdu(pdu: Pdu): void {
    if (!isBindResp(pdu)) {
      this.log.info({ command: commandName(pdu), seq: pdu.sequence_number }, 'Unexpected PDU while binding');
      return;
    }

    if (pdu.command_status !== CommandStatus.ESME_ROK) {
      this.log.error({ status: describeStatus(pdu.command_status), systemId: pdu.system_id }, 'Bind rejected');
      this.terminate(new BindFailedError(pdu.command_status), 'bind_failed');
      return;
    }

    this.transition('bound');
    metrics.boundSessions.inc();
    this.log.info({ systemId: pdu.system_id, command: pdu.command }, 'Bound');

    if (this.keepalive.start(this.config.enquireLinkIntervalMs, () => this.enqueue({ type: 'command', command: { kind: 'send_enquire_link' } }))) {
      this.log.debug({ intervalMs: this.config.enquireLinkIntervalMs }, 'Starting enquire_link loop');
    }

    this.pendingBind?.resolve();
    this.pendingBind = null;

    this.notifyState('bound');
    this.notify('bound', () => this.emit('bound'));
    this.replayStash();
  }

  private onBoundPdu(pdu: Pdu): void {
    switch (pdu.command) {
      case 'submit_sm_resp':
      case 'generic_nack': {
        const watcher = this.window.resolve(pdu.sequence_number);
        if (!watcher) {
          metrics.unmatchedResponses.inc({ command: pdu.command });
          this.log.warn(
            { command: pdu.command, seq: pdu.sequence_number, status: describeStatus(pdu.command_status) },
            'Response for unknown sequence number',
          );
          return;
        }
        metrics.windowSize.set(this.window.size);
        const result = toSubmitResult(pdu);
        metrics.submitSmAcks.inc({ status: String(result.status) });
        this.log.debug({ seq: pdu.sequence_number, status: describeStatus(result.status), messageId: result.messageId }, 'Incoming submit_sm_resp');
        watcher.deliver(pdu.sequence_number, result);
        return;
      }

      case 'enquire_link':
        this.send(buildEnquireLinkResp(pdu.sequence_number));
        return;

      case 'enquire_link_resp':
        return;

      case 'deliver_sm': {
        const message = toReceiveMessage(pdu);
        this.log.info(
          { seq: pdu.sequence_number, from: maskAddress(message.from.number), to: maskAddress(message.to.number) },
          'Received message',
        );
        this.notify('message', () => this.emit('message', message));
        this.send(buildDeliverSmResp(pdu.sequence_number));
        return;
      }

      case 'unbind':
        this.log.info('SMSC requested unbind');
        this.send(buildUnbindResp(pdu.sequence_number));
        this.terminate(new SessionClosedError('Session closed: unbound by peer'), 'peer_unbind');
        return;

      default:
        this.log.warn({ command: commandName(pdu), seq: pdu.sequence_number }, 'Received unsupported PDU, responding with generic_nack');
        this.send(buildGenericNack(pdu.sequence_number, CommandStatus.ESME_RCANCELFAIL));
    }
  }

  // ── Commands ────────────────────────────────────────────────────

  /** A command whose handler throws is rejected with that error. */
  private runCommand(command: Command): void {
    try {
      this.onCommand(command);
    } catch (err) {
      const error = toError(err);
      this.log.error({ command: command.kind, error: error.message }, 'Command failed');
      this.rejectCommand(command, error);
    }
  }

  private onCommand(command: Command): void {
    if (command.kind === 'close') {
      this.closeSession(command.requester);
      return;
    }

    switch (this.current) {
      case 'terminated':
        this.rejectCommand(command, this.terminalError ?? new SessionClosedError());
        return;
      case 'bound':
        this.onBoundCommand(command);
        return;
      case 'awaiting_bind':
        if (command.kind === 'bind') {
          this.sendBind(command.bind, command.requester);
          return;
        }
        this.stashCommand(command);
        return;
      default:
        this.stashCommand(command);
    }
  }

  private onBoundCommand(command: Exclude<Command, { kind: 'close' }>): void {
    switch (command.kind) {
      case 'bind':
        command.requester.reject(new AlreadyBoundError());
        return;
      case 'send_message':
        this.submit(command.message, command.requester);
        return;
      case 'send_enquire_link':
        this.log.debug('Sending enquire_link');
        this.send(buildEnquireLink(this.sequence.next()));
        return;
    }
  }

  private sendBind(bind: Bind, requester: Requester<void>): void {
    const pdu = buildBindPdu(bind, this.sequence.next());
    this.log.info({ command: pdu.command, systemId: pdu.system_id, seq: pdu.sequence_number }, 'Making bind request');
    this.send(pdu);
    this.pendingBind = requester;
    this.transition('binding');
    this.notifyState('binding');
  }

  private submit(message: SendMessage, requester: Requester<SendMessageAck>): void {
    const seq = this.sequence.next();
    const pdu = buildSubmitSm(message, seq);
    const watcher = new ResponseWatcher({
      sequenceNumbers: [seq],
      requester,
      timeoutMs: this.config.requestTimeoutMs,
      onExpire: sequenceNumbers => this.enqueue({ type: 'expired', sequenceNumbers }),
    });

    this.window.register(seq, watcher);
    metrics.windowSize.set(this.window.size);

    this.log.info({ seq, to: maskAddress(message.to.number), from: maskAddress(message.from.number) }, 'Sending message');
    try {
      this.send(pdu);
    } catch (err) {
      this.window.resolve(seq);
      metrics.windowSize.set(this.window.size);
      const error = toError(err);
      this.log.error({ seq, error: error.message }, 'Failed to send submit_sm');
      watcher.fail(error);
      return;
    }
    metrics.submitSmSent.inc();
  }

  private onExpired(sequenceNumbers: number[]): void {
    for (const seq of sequenceNumbers) {
      if (this.window.resolve(seq)) {
        metrics.requestTimeouts.inc();
        this.log.warn({ seq }, 'Request timed out waiting for submit_sm_resp');
      }
    }
    metrics.windowSize.set(this.window.size);
  }

  private closeSession(requester: Requester<void>): void {
    if (this.current === 'terminated') {
      requester.resolve();
      return;
    }
    if (this.current === 'bound') {
      try {
        this.send(buildUnbind(this.sequence.next()));
      } catch (err) {
        this.log.warn({ error: toError(err).message }, 'Failed to send unbind');
      }
    }
    this.terminate(new SessionClosedError('Session closed by client'), 'closed');
    requester.resolve();
  }

  private stashCommand(command: Command): void {
    if (command.kind === 'send_enquire_link') return;
    this.stash.push(command);
  }

  private replayStash(): void {
    const pending = this.stash.splice(0);
    for (const command of pending) {
      this.runCommand(command);
    }
  }

  private rejectCommand(command: Command, error: Error): void {
    switch (command.kind) {
      case 'bind':
      case 'send_message':
        command.requester.reject(error);
        return;
      case 'close':
        command.requester.resolve();
        return;
      case 'send_enquire_link':
        return;
    }
  }

  // ── Lifecycle ───────────────────────────────────────────────────

  private send(pdu: OutboundPdu): void {
    if (!this.connection) {
      this.log.warn({ command: pdu.command, seq: pdu.sequence_number }, 'No connection, PDU dropped');
      return;
    }
    this.connection.send(pdu);
    metrics.pdusSent.inc({ command: pdu.command });
  }

  /** Listeners hear about the change separately, through notifyState(). */
  private transition(next: SessionState): void {
    this.log.debug({ from: this.current, to: next }, 'Session state change');
    this.current = next;
  }

  private notifyState(state: SessionState): void {
    this.notify('state', () => this.emit('state', state));
  }

  /** Listener errors are logged and never reach the session. */
  private notify(event: keyof SmppClientEvents, emit: () => void): void {
    try {
      emit();
    } catch (err) {
      this.log.error({ event, error: toError(err).message }, 'Session listener failed');
    }
  }

  private terminate(error: Error, reason: TerminationReason): void {
    if (this.current === 'terminated') return;

    const wasBound = this.current === 'bound';
    this.terminalError = error;
    this.keepalive.cancel();
    this.clearConnectTimer();
    this.connectAbort?.abort();
    this.connectAbort = null;
    this.transition('terminated');
    if (wasBound) metrics.boundSessions.dec();

    const watchers = this.window.drainAll();
    metrics.windowSize.set(0);
    for (const watcher of watchers) {
      watcher.fail(error);
    }

    this.pendingBind?.reject(error);
    this.pendingBind = null;

    for (const command of this.stash.splice(0)) {
      this.rejectCommand(command, error);
    }

    if (this.connection) {
      this.connection.close();
      this.connection = null;
    }

    metrics.sessionTerminations.inc({ reason });
    this.log.info({ reason, failedRequests: watchers.length }, 'Session terminated');
    this.notifyState('terminated');
    this.notify('terminated', () => this.emit('terminated', error));
  }

  private clearConnectTimer(): void {
    if (this.connectTimer) {
      clearTimeout(this.connectTimer);
      this.connectTimer = null;
    }
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
