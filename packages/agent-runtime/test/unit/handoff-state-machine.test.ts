/**
 * Tests for Handoff State Machine
 */
import { describe, it, expect, beforeEach } from 'vitest';
import {
  HandoffStateMachine,
  canTransition,
  deriveHandoffState,
  isHandoffRequest,
} from '../../src/core/handoff-state-machine.js';
import { HandoffState } from '../../src/types/index.js';
import type { UserRecord } from '../../src/types/index.js';
import { HANDOFF_NOTICE, INTERVENTION_ENDED_MESSAGE } from '../../src/prompts/customer-messages.js';
import { InMemoryLedger, InMemoryOrderStore, InMemoryUserDirectory, T0, TEST_PHONE, hoursAfter, minutesAfter } from './mocks.js';

describe('isHandoffRequest', () => {
  it.each(['#human', 'operador', '  OPERADOR  ', 'Hablar con humano', 'ayuda humana'])(
    'should detect the trigger phrase "%s"',
    (body) => {
      expect(isHandoffRequest(body)).toBe(true);
    }
  );

  it('should detect "hablar con" anywhere in the message', () => {
    expect(isHandoffRequest('Quiero hablar con alguien por favor')).toBe(true);
  });

  it('should not treat an order as a handoff request', () => {
    expect(isHandoffRequest('Quiero 2 California Roll')).toBe(false);
    expect(isHandoffRequest('el operador de delivery llegó tarde')).toBe(false);
    expect(isHandoffRequest('   ')).toBe(false);
  });
});

describe('deriveHandoffState', () => {
  const window = 2 * 60 * 60 * 1000;

  it('should be automated without flagged messages', () => {
    expect(deriveHandoffState(null, null, T0, window)).toBe(HandoffState.AUTOMATED);
  });

  it('should be human while the flagged message is inside the window', () => {
    expect(deriveHandoffState(T0, null, hoursAfter(T0, 2), window)).toBe(HandoffState.HUMAN_ACTIVE);
  });

  it('should expire once the flagged message is older than the window', () => {
    expect(deriveHandoffState(T0, null, minutesAfter(T0, 121), window)).toBe(HandoffState.AUTOMATED);
  });

  it('should be automated when a release is newer than the flagged message', () => {
    expect(deriveHandoffState(T0, minutesAfter(T0, 5), minutesAfter(T0, 10), window)).toBe(HandoffState.AUTOMATED);
  });

  it('should stay human when the release predates the flagged message', () => {
    expect(deriveHandoffState(minutesAfter(T0, 5), T0, minutesAfter(T0, 10), window)).toBe(
      HandoffState.HUMAN_ACTIVE
    );
  });
});

describe('canTransition', () => {
  it('should only allow releasing from human mode', () => {
    expect(canTransition(HandoffState.AUTOMATED, 'escalate')).toBe(true);
    expect(canTransition(HandoffState.AUTOMATED, 'end_intervention')).toBe(false);
    expect(canTransition(HandoffState.HUMAN_ACTIVE, 'end_intervention')).toBe(true);
    expect(canTransition(HandoffState.HUMAN_ACTIVE, 'handoff_request')).toBe(false);
  });
});

describe('HandoffStateMachine', () => {
  let ledger: InMemoryLedger;
  let users: InMemoryUserDirectory;
  let machine: HandoffStateMachine;
  let user: UserRecord;

  beforeEach(async () => {
    ledger = new InMemoryLedger();
    users = new InMemoryUserDirectory(new InMemoryOrderStore());
    machine = new HandoffStateMachine(ledger, users, { ioTimeoutMs: 1000 });
    ({ user } = await users.ensureUser({ phone: TEST_PHONE, channel: 'whatsapp' }, T0));
  });

  it('should append the notice and the operator alert when escalating', async () => {
    const escalated = await machine.escalate(user, 'session-1', T0, { trigger: 'handoff_request' });

    expect(escalated).toBe(true);
    const entries = ledger.forUser(user.id);
    expect(entries).toHaveLength(2);
    expect(entries.every((m) => m.role === 'system' && m.handoff && m.sessionId === 'session-1')).toBe(true);
    expect(entries[0]?.body).toBe(HANDOFF_NOTICE);
    expect(entries[1]?.body).toBe(
      [
        '⚠️ ATENCIÓN REQUERIDA',
        'Usuario: Sin nombre',
        `Teléfono: ${TEST_PHONE}`,
        'Dirección: No registrada',
        'Canal: whatsapp',
        'Por favor, continúe la conversación desde el panel de operadores.',
      ].join('\n')
    );
    await expect(machine.isInHumanMode(user.id, minutesAfter(T0, 1))).resolves.toBe(true);
  });

  it('should refuse to escalate twice', async () => {
    await machine.escalate(user, 'session-1', T0, { trigger: 'escalate' });

    await expect(
      machine.escalate(user, 'session-1', minutesAfter(T0, 1), { trigger: 'escalate' })
    ).resolves.toBe(false);
    expect(ledger.messages).toHaveLength(2);
  });

  it('should fall back to automated two hours after the last flagged message', async () => {
    await machine.escalate(user, 'session-1', T0, { trigger: 'escalate' });

    await expect(machine.currentState(user.id, hoursAfter(T0, 2))).resolves.toBe(HandoffState.HUMAN_ACTIVE);
    await expect(machine.currentState(user.id, minutesAfter(T0, 121))).resolves.toBe(HandoffState.AUTOMATED);
  });

  it('should return to automated mode when the intervention ends', async () => {
    await machine.escalate(user, 'session-1', T0, { trigger: 'escalate' });

    const ended = await machine.endIntervention(user, 'session-1', minutesAfter(T0, 30));

    expect(ended).toBe(true);
    const release = ledger.messages[ledger.messages.length - 1];
    expect(release).toMatchObject({
      role: 'agent',
      handoff: false,
      releasesHandoff: true,
      body: INTERVENTION_ENDED_MESSAGE,
    });
    await expect(machine.isInHumanMode(user.id, minutesAfter(T0, 31))).resolves.toBe(false);
    await expect(machine.hasRecentFlaggedMessage(user.id, minutesAfter(T0, 31))).resolves.toBe(true);
  });

  it('should not treat an ordinary agent reply as a release', async () => {
    await ledger.append({
      userId: user.id,
      role: 'agent',
      body: '¡Hola! ¿Qué te gustaría pedir?',
      createdAt: minutesAfter(T0, 1),
      channel: 'whatsapp',
      sessionId: 'session-1',
      handoff: false,
    });
    await machine.escalate(user, 'session-1', T0, { trigger: 'handoff_request' });

    await expect(machine.isInHumanMode(user.id, minutesAfter(T0, 2))).resolves.toBe(true);
  });

  it('should trust the state observed before the trigger was recorded', async () => {
    await ledger.append({
      userId: user.id,
      role: 'user',
      body: 'operador',
      createdAt: T0,
      channel: 'whatsapp',
      sessionId: 'session-1',
      handoff: true,
    });

    const escalated = await machine.escalate(user, 'session-1', T0, {
      trigger: 'handoff_request',
      observedState: HandoffState.AUTOMATED,
    });

    expect(escalated).toBe(true);
    expect(ledger.messages.map((m) => m.role)).toEqual(['user', 'system', 'system']);
  });

  it('should report false when ending an intervention that is not active', async () => {
    await expect(machine.endIntervention(user, 'session-1', T0)).resolves.toBe(false);
    expect(ledger.messages).toHaveLength(0);
  });

  it('should assume automated when history is unreadable', async () => {
    await machine.escalate(user, 'session-1', T0, { trigger: 'escalate' });
    ledger.failReads = true;

    await expect(machine.currentState(user.id, minutesAfter(T0, 1))).resolves.toBe(HandoffState.AUTOMATED);
  });

  it('should report false when the handoff cannot be recorded', async () => {
    ledger.failWrites = true;

    await expect(machine.escalate(user, 'session-1', T0, { trigger: 'escalate' })).resolves.toBe(false);
  });
});
