import { afterEach, describe, expect, it, vi } from 'vitest';
import type { SessionManager, SessionManagerOptions } from '../src/session/session-manager.js';
import { type SessionEvent, SessionState } from '../src/session/types.js';
import type { AnalysisReport } from '../src/analysis/types.js';
import { type FakeGdbProcess, waitFor, withEnrichment } from './helpers/fake-gdb.js';
import { createTestManager } from './helpers/manager.js';

const SEGV_STOP =
  '*stopped,reason="signal-received",signal-name="SIGSEGV",signal-meaning="Segmentation fault",' +
  'frame={addr="0x0000000000401136",func="deref",args=[],file="crash.c",fullname="/src/crash.c",line="5"},' +
  'thread-id="1",stopped-threads="all"';

const PANIC_STACK =
  '^done,stack=[frame={level="0",addr="0x80100abc",func="panic",file="kernel.c",fullname="/k/kernel.c",line="42"},' +
  'frame={level="1",addr="0x80103f20",func="trap",file="trap.c",fullname="/k/trap.c",line="37"}]';

const managers: SessionManager[] = [];

afterEach(async () => {
  await Promise.all(managers.splice(0).map((manager) => manager.shutdown()));
});

function createManager(...args: Parameters<typeof createTestManager>) {
  const created = createTestManager(...args);
  managers.push(created.manager);
  return created;
}

function recordStates(manager: SessionManager): SessionState[] {
  const states: SessionState[] = [];
  manager.on('sessionStateChanged', (_sessionId: string, state: SessionState) => states.push(state));
  return states;
}

async function connected(
  configure?: (gdb: FakeGdbProcess) => void,
  overrides?: Partial<SessionManagerOptions>
) {
  const { manager, spawner } = createManager(configure, overrides);
  const session = manager.createSession();
  const events: SessionEvent[] = [];
  manager.eventsFor(session.id, (event) => events.push(event));
  await manager.connect(session.id, 'localhost:1234');
  return { manager, spawner, sessionId: session.id, events, gdb: spawner.processes[0] };
}

describe('SessionManager', () => {
  describe('createSession', () => {
    it('creates idle sessions with unique ids', () => {
      const { manager } = createManager();
      const created = vi.fn();
      manager.on('sessionCreated', created);

      const first = manager.createSession();
      const second = manager.createSession();

      expect(first.state).toBe(SessionState.IDLE);
      expect(first.id).not.toBe(second.id);
      expect(manager.listSessions().map((session) => session.id)).toEqual([first.id, second.id]);
      expect(created).toHaveBeenCalledTimes(2);
    });

    it('returns copies of the session info', () => {
      const { manager } = createManager();
      const session = manager.createSession();

      session.state = SessionState.FAILED;

      expect(manager.getSessionInfo(session.id).state).toBe(SessionState.IDLE);
    });
  });

  describe('connect', () => {
    it('goes through starting and connecting to connected', async () => {
      const { manager, spawner } = createManager();
      const states = recordStates(manager);
      const session = manager.createSession();

      const info = await manager.connect(session.id, 'localhost:1234');

      expect(states).toEqual([SessionState.STARTING, SessionState.CONNECTING, SessionState.CONNECTED]);
      expect(info).toMatchObject({ id: session.id, state: SessionState.CONNECTED, target: 'localhost:1234' });
      expect(spawner.calls).toEqual([{ command: 'gdb', args: ['--interpreter=mi', '-q', '-nx'] }]);
      expect(spawner.processes[0].commands).toEqual(['-target-select remote localhost:1234']);
    });

    it('loads a local executable when the target is a path', async () => {
      const { manager, spawner } = createManager();
      const session = manager.createSession();

      await manager.connect(session.id, '/tmp/crash');

      expect(spawner.processes[0].commands).toEqual(['-file-exec-and-symbols "/tmp/crash"']);
    });

    it('fails the session when the target refuses the connection', async () => {
      const { manager, spawner } = createManager((gdb) => {
        gdb.reply('-target-select remote localhost:1', '^error,msg="localhost:1: Connection refused."');
      });
      const states = recordStates(manager);
      const session = manager.createSession();

      await expect(manager.connect(session.id, 'localhost:1')).rejects.toMatchObject({
        name: 'ConnectError',
        code: 'CONNECT_FAILED',
        message: 'Failed to connect to localhost:1: localhost:1: Connection refused.'
      });

      expect(states).toEqual([SessionState.STARTING, SessionState.CONNECTING, SessionState.FAILED]);
      expect(manager.getSessionInfo(session.id)).toMatchObject({
        state: SessionState.FAILED,
        error: 'Failed to connect to localhost:1: localhost:1: Connection refused.'
      });
      expect(spawner.processes[0].signals).toEqual(['SIGTERM']);
    });

    it('fails the session when gdb cannot start', async () => {
      const { manager } = createManager(undefined, {
        spawnProcess: () => {
          throw new Error('spawn gdb ENOENT');
        }
      });
      const session = manager.createSession();

      await expect(manager.connect(session.id, 'localhost:1234')).rejects.toMatchObject({
        code: 'START_FAILED',
        message: 'Failed to start gdb: spawn gdb ENOENT'
      });
      expect(manager.getSessionInfo(session.id).state).toBe(SessionState.FAILED);
    });

    it('refuses to connect a session twice', async () => {
      const { manager, sessionId } = await connected();

      await expect(manager.connect(sessionId, 'localhost:1234')).rejects.toMatchObject({
        code: 'CONNECT_FAILED',
        message: `Session ${sessionId} is connected; create a new session to connect again`
      });
    });

    it('adopts the run state the target reports while connecting', async () => {
      const { manager, spawner } = createManager((gdb) => {
        gdb.reply('-target-select remote localhost:1234', (token) => [
          '*stopped,frame={addr="0x0000fff0",func="??",args=[]},thread-id="1",stopped-threads="all"',
          `${token}^connected`,
          '(gdb)'
        ]);
      });
      const session = manager.createSession();

      await manager.connect(session.id, 'localhost:1234');
      await waitFor(() => manager.getSessionInfo(session.id).state === SessionState.STOPPED);

      expect(manager.getSessionInfo(session.id).stopReason).toBe('unknown');
      expect(spawner.processes[0].commands).toEqual(['-target-select remote localhost:1234']);
    });

    it('runs the program when asked to', async () => {
      const { manager, spawner } = createManager((gdb) => {
        gdb.reply('-exec-run', (token) => [`${token}^running`, '*running,thread-id="all"', '(gdb)']);
      });
      const session = manager.createSession();

      await manager.connect(session.id, '/tmp/loop', { autoRun: true });
      await waitFor(() => manager.getSessionInfo(session.id).state === SessionState.RUNNING);

      expect(spawner.processes[0].commands).toEqual(['-file-exec-and-symbols "/tmp/loop"', '-exec-run']);
    });

    it('reports a failed auto-run as an error event and stays connected', async () => {
      const { manager } = createManager((gdb) => {
        gdb.reply('-exec-run', '^error,msg="No executable file specified."');
      });
      const session = manager.createSession();
      const subscription = manager.eventsFor(session.id);

      const info = await manager.connect(session.id, '/tmp/missing', { autoRun: true });

      expect(info.state).toBe(SessionState.CONNECTED);
      expect(subscription.drain()).toEqual([
        { kind: 'error', message: 'Failed to run target: No executable file specified.' }
      ]);
    });

    it('aborts when disconnected while gdb is still starting', async () => {
      const { manager, spawner } = createManager(undefined, {}, { prompt: false });
      const session = manager.createSession();

      const connecting = manager.connect(session.id, 'localhost:1234');
      const outcome = expect(connecting).rejects.toMatchObject({
        code: 'CONNECT_FAILED',
        message: 'Session was disconnected while connecting'
      });
      await waitFor(() => spawner.processes.length === 1);

      const info = await manager.disconnect(session.id);

      await outcome;
      expect(info.state).toBe(SessionState.DISCONNECTED);
      expect(spawner.processes[0].signals).toEqual(['SIGTERM']);
    });
  });

  describe('commands', () => {
    it('rejects commands for unknown or unconnected sessions', async () => {
      const { manager } = createManager();
      const session = manager.createSession();

      await expect(manager.dispatch('nope', '-gdb-version')).rejects.toMatchObject({
        code: 'SESSION_NOT_FOUND',
        message: 'Session not found: nope'
      });
      await expect(manager.getBacktrace(session.id)).rejects.toMatchObject({
        code: 'NOT_CONNECTED',
        message: `Session ${session.id} is idle, not connected`
      });
    });

    it('returns console output for CLI commands', async () => {
      const { manager, sessionId, gdb } = await connected((fake) => {
        fake.reply(/^-interpreter-exec console/, (token) => ['~"rax            0x0\\n"', `${token}^done`, '(gdb)']);
      });

      const output = await manager.cliCommand(sessionId, 'info registers rax');

      expect(output).toBe('rax            0x0\n');
      expect(gdb.commands[1]).toBe('-interpreter-exec console "info registers rax"');
    });

    it('keeps at most one command in flight, in issue order', async () => {
      const { manager, sessionId, gdb } = await connected();
      gdb.silent = true;

      const commands = ['-exec-next', '-exec-step', '-exec-finish', '-exec-continue'];
      const replies = commands.map((command) => manager.dispatch(sessionId, command));

      for (let index = 0; index < commands.length; index++) {
        await waitFor(() => gdb.commands.length === index + 2);
        gdb.write(`${index + 2}^done`, '(gdb)');
      }

      const responses = await Promise.all(replies);
      expect(responses.map((response) => response.command)).toEqual(commands);
      expect(gdb.commands.slice(1)).toEqual(commands);
    });

    it('maps control actions to execution commands', async () => {
      const { manager, sessionId, gdb } = await connected();

      await manager.control(sessionId, 'run');
      await manager.control(sessionId, 'continue');
      await manager.control(sessionId, 'step_over');
      await manager.control(sessionId, 'step_into');
      await manager.control(sessionId, 'step_out');
      await manager.control(sessionId, 'interrupt');

      expect(gdb.commands.slice(1)).toEqual([
        '-exec-run',
        '-exec-continue',
        '-exec-next',
        '-exec-step',
        '-exec-finish',
        '-exec-interrupt'
      ]);
    });

    it('reads backtrace, registers and memory', async () => {
      const { manager, sessionId, gdb } = await connected();
      gdb.reply('-data-read-memory-bytes &buf 2', '^done,memory=[{begin="0x601040",end="0x601042",contents="4142"}]');

      const frames = await manager.getBacktrace(sessionId);
      const registers = await manager.getRegisters(sessionId);
      const memory = await manager.readMemory(sessionId, '&buf', 2);

      expect(frames.map((frame) => frame.function)).toEqual(['deref', 'main']);
      expect(registers.rsp).toBe('0x7ffe00f0');
      expect(memory).toEqual({ begin: '0x601040', end: '0x601042', contents: '4142' });
    });
  });

  describe('crash handling', () => {
    it('publishes one analyzed crash event and marks the session stopped', async () => {
      const report: AnalysisReport = { summary: 'stub', architecture: 'x86_64', findings: [], hypotheses: [] };
      const analyze = vi.fn((_text: string) => report);
      const { manager, sessionId, gdb, events } = await connected(withEnrichment, { analyzer: { analyze } });

      gdb.write('*running,thread-id="all"');
      await waitFor(() => manager.getSessionInfo(sessionId).state === SessionState.RUNNING);
      gdb.write(SEGV_STOP);
      await waitFor(() => events.some((event) => event.kind === 'crashed'));

      expect(analyze).toHaveBeenCalledTimes(1);
      expect(events.map((event) => event.kind)).toEqual(['running', 'crashed']);
      expect(events[1]).toMatchObject({ kind: 'crashed', signal: 'SIGSEGV', analysis: report });
      expect(manager.getSessionInfo(sessionId)).toMatchObject({
        state: SessionState.STOPPED,
        stopReason: 'signal SIGSEGV'
      });
    });

    it('runs the built-in analyzer by default', async () => {
      const { gdb, events } = await connected();

      gdb.write(SEGV_STOP);
      await waitFor(() => events.length === 1);

      expect(events[0]).toMatchObject({
        kind: 'crashed',
        analysis: {
          summary: 'Program crashed in `deref()`. Backtrace has 2 frame(s).',
          architecture: 'x86_64',
          findings: [
            { severity: 'warning', category: 'null_pointer', message: 'Register RAX is 0x0 (NULL).' },
            { severity: 'warning', category: 'null_pointer', message: 'Register RDI is 0x0 (NULL).' }
          ]
        }
      });
    });

    it('publishes crashes without analysis when the analyzer is disabled', async () => {
      const { gdb, events } = await connected(withEnrichment, { analyzer: null });

      gdb.write(SEGV_STOP);
      await waitFor(() => events.length === 1);

      expect(events[0]).toMatchObject({ kind: 'crashed', analysis: undefined });
    });

    it('stops at a breakpoint on panic with its backtrace', async () => {
      const { manager, sessionId, gdb, events } = await connected((fake) => {
        fake
          .reply(
            '-break-insert panic',
            '^done,bkpt={number="1",type="breakpoint",disp="keep",enabled="y",addr="0x80100abc",func="panic",file="kernel.c",fullname="/k/kernel.c",line="42",times="0"}'
          )
          .reply('-exec-continue', (token) => [
            `${token}^running`,
            '*running,thread-id="all"',
            '(gdb)',
            '*stopped,reason="breakpoint-hit",disp="keep",bkptno="1",frame={addr="0x80100abc",func="panic",args=[],file="kernel.c",fullname="/k/kernel.c",line="42"},thread-id="1"'
          ])
          .reply('-stack-list-frames', PANIC_STACK)
          .reply('-data-list-register-names', '^done,register-names=["ra","sp","pc","a0"]')
          .reply(
            '-data-list-register-values x',
            '^done,register-values=[{number="0",value="0x80103f20"},{number="1",value="0x8dffef90"},{number="2",value="0x80100abc"},{number="3",value="0x80107a2c"}]'
          );
      });

      const breakpoint = await manager.setBreakpoint(sessionId, 'panic');
      expect(breakpoint).toEqual({
        number: 1,
        location: 'panic',
        address: '0x80100abc',
        function: 'panic',
        file: 'kernel.c',
        line: 42
      });

      await manager.control(sessionId, 'continue');
      await waitFor(() => events.some((event) => event.kind === 'breakpoint_hit'));

      expect(events.map((event) => event.kind)).toEqual(['running', 'breakpoint_hit']);
      expect(events[1]).toMatchObject({
        kind: 'breakpoint_hit',
        number: 1,
        backtrace: [
          { level: 0, function: 'panic', file: 'kernel.c', line: 42 },
          { level: 1, function: 'trap', file: 'trap.c', line: 37 }
        ],
        registers: { ra: '0x80103f20', sp: '0x8dffef90', pc: '0x80100abc', a0: '0x80107a2c' },
        enrichmentErrors: []
      });
      expect(manager.getSessionInfo(sessionId)).toMatchObject({
        state: SessionState.STOPPED,
        stopReason: 'breakpoint 1'
      });
      expect(gdb.commands.slice(1)).toEqual([
        '-break-insert panic',
        '-exec-continue',
        '-stack-list-frames',
        '-data-list-register-names',
        '-data-list-register-values x'
      ]);
    });

    it('returns to connected when the program exits right away', async () => {
      const { manager, sessionId, gdb, events } = await connected((fake) => {
        fake.reply('-exec-run', (token) => [
          `${token}^running`,
          '*running,thread-id="all"',
          '(gdb)',
          '*stopped,reason="exited",exit-code="03"'
        ]);
      });
      const states = recordStates(manager);

      await manager.control(sessionId, 'run');
      await waitFor(() => events.some((event) => event.kind === 'exited'));

      expect(events).toEqual([
        { kind: 'running', threadId: 'all' },
        { kind: 'exited', code: 3 }
      ]);
      expect(states).toEqual([SessionState.RUNNING, SessionState.CONNECTED]);
      expect(manager.getSessionInfo(sessionId)).toMatchObject({ state: SessionState.CONNECTED, exitCode: 3 });
      expect(gdb.signals).toEqual([]);
    });
  });

  describe('health', () => {
    it('tolerates one timeout and disconnects after two in a row', async () => {
      const { manager, sessionId, gdb, events } = await connected(
        (fake) => {
          withEnrichment(fake).reply(/^-hang/, () => []);
        },
        {
          debugger: {
            path: 'gdb',
            args: [],
            commandTimeoutMs: 40,
            startupTimeoutMs: 500,
            killTimeoutMs: 50,
            queueDepth: 32,
            queueMode: 'queue'
          }
        }
      );

      await expect(manager.dispatch(sessionId, '-hang-1')).rejects.toMatchObject({ code: 'COMMAND_TIMEOUT' });
      expect(manager.getSessionInfo(sessionId).state).toBe(SessionState.CONNECTED);

      await expect(manager.dispatch(sessionId, '-hang-2')).rejects.toMatchObject({ code: 'COMMAND_TIMEOUT' });
      expect(manager.getSessionInfo(sessionId)).toMatchObject({
        state: SessionState.DISCONNECTED,
        error: 'GDB stopped responding (2 consecutive command timeouts)'
      });
      expect(events).toEqual([{ kind: 'error', message: 'GDB stopped responding (2 consecutive command timeouts)' }]);
      await waitFor(() => gdb.signals.length > 0);
      expect(gdb.signals).toEqual(['SIGTERM']);
    });

    it('resets the timeout count once gdb answers', async () => {
      const { manager, sessionId } = await connected(
        (fake) => {
          fake.reply(/^-hang/, () => []);
        },
        {
          debugger: {
            path: 'gdb',
            args: [],
            commandTimeoutMs: 40,
            startupTimeoutMs: 500,
            killTimeoutMs: 50,
            queueDepth: 32,
            queueMode: 'queue'
          }
        }
      );

      await expect(manager.dispatch(sessionId, '-hang-1')).rejects.toMatchObject({ code: 'COMMAND_TIMEOUT' });
      await manager.dispatch(sessionId, '-gdb-version');
      await expect(manager.dispatch(sessionId, '-hang-2')).rejects.toMatchObject({ code: 'COMMAND_TIMEOUT' });

      expect(manager.getSessionInfo(sessionId).state).toBe(SessionState.CONNECTED);
    });

    it('disconnects when gdb dies', async () => {
      const { manager, sessionId, gdb, events } = await connected();
      const terminated = vi.fn();
      manager.on('sessionTerminated', terminated);

      gdb.exit(1);
      await waitFor(() => terminated.mock.calls.length === 1);

      expect(manager.getSessionInfo(sessionId)).toMatchObject({
        state: SessionState.DISCONNECTED,
        error: 'GDB exited unexpectedly with code 1'
      });
      expect(events).toEqual([{ kind: 'error', message: 'GDB exited unexpectedly with code 1' }]);
      await expect(manager.dispatch(sessionId, '-gdb-version')).rejects.toMatchObject({ code: 'NOT_CONNECTED' });
    });
  });

  describe('disconnect', () => {
    it('is idempotent for a session that never connected', async () => {
      const { manager, spawner } = createManager();
      const session = manager.createSession();

      const first = await manager.disconnect(session.id);
      const second = await manager.disconnect(session.id);

      expect(first.state).toBe(SessionState.DISCONNECTED);
      expect(second.state).toBe(SessionState.DISCONNECTED);
      expect(spawner.calls).toEqual([]);
    });

    it('rejects in-flight commands and terminates gdb once', async () => {
      const { manager, sessionId, gdb } = await connected();
      gdb.silent = true;
      const pending = manager.dispatch(sessionId, '-exec-continue');
      const outcome = expect(pending).rejects.toMatchObject({ code: 'PROCESS_EXITED' });
      await waitFor(() => gdb.commands.length === 2);

      const [first, second] = await Promise.all([manager.disconnect(sessionId), manager.disconnect(sessionId)]);

      await outcome;
      expect(first.state).toBe(SessionState.DISCONNECTED);
      expect(second.state).toBe(SessionState.DISCONNECTED);
      expect(gdb.signals).toEqual(['SIGTERM']);
      expect(gdb.signalCode).toBe('SIGTERM');
    });

    it('drops a crash that is still being enriched', async () => {
      const { manager, sessionId, gdb, events } = await connected((fake) => {
        fake.reply('-stack-list-frames', () => []);
      });

      gdb.write(SEGV_STOP);
      await waitFor(() => gdb.commands.includes('-stack-list-frames'));

      await manager.disconnect(sessionId);

      expect(events).toEqual([]);
      expect(gdb.signals).toEqual(['SIGTERM']);
      expect(manager.getSessionInfo(sessionId).state).toBe(SessionState.DISCONNECTED);
    });

    it('keeps a failed session failed', async () => {
      const { manager } = createManager((gdb) => {
        gdb.reply(/^-target-select/, '^error,msg="Connection timed out."');
      });
      const session = manager.createSession();
      await manager.connect(session.id, 'localhost:9').catch(() => undefined);

      const info = await manager.disconnect(session.id);

      expect(info.state).toBe(SessionState.FAILED);
    });
  });

  describe('subscriptions', () => {
    it('buffers events until drained', async () => {
      const { manager, sessionId, gdb } = await connected();
      const subscription = manager.eventsFor(sessionId);

      gdb.write('~"one\\n"', '~"two\\n"');
      await manager.dispatch(sessionId, '-gdb-version');

      expect(subscription.drain()).toEqual([
        { kind: 'console_output', stream: 'console', text: 'one\n' },
        { kind: 'console_output', stream: 'console', text: 'two\n' }
      ]);
      expect(subscription.drain()).toEqual([]);
    });

    it('keeps only the newest events when the buffer overflows', async () => {
      const { manager, sessionId, gdb } = await connected(withEnrichment, { maxBufferedEvents: 2 });
      const subscription = manager.eventsFor(sessionId);

      gdb.write('~"a"', '~"b"', '~"c"');
      await manager.dispatch(sessionId, '-gdb-version');

      expect(subscription.drain().map((event) => (event.kind === 'console_output' ? event.text : event.kind))).toEqual([
        'b',
        'c'
      ]);
    });

    it('stops delivering after unsubscribe and survives a throwing listener', async () => {
      const { manager, sessionId, gdb } = await connected();
      const received: SessionEvent[] = [];
      manager.eventsFor(sessionId, () => {
        throw new Error('listener bug');
      });
      const subscription = manager.eventsFor(sessionId, (event) => received.push(event));

      gdb.write('~"first"');
      await waitFor(() => received.length === 1);
      subscription.unsubscribe();
      gdb.write('~"second"');
      await manager.dispatch(sessionId, '-gdb-version');

      expect(received).toEqual([{ kind: 'console_output', stream: 'console', text: 'first' }]);
    });
  });

  describe('destroySession', () => {
    it('terminates gdb and forgets the session', async () => {
      const { manager, sessionId, gdb } = await connected();

      await manager.destroySession(sessionId);

      expect(manager.hasSession(sessionId)).toBe(false);
      expect(() => manager.getSessionInfo(sessionId)).toThrow(`Session not found: ${sessionId}`);
      expect(gdb.signals).toEqual(['SIGTERM']);
    });

    it('keeps sessions independent', async () => {
      const { manager, spawner } = createManager();
      const first = manager.createSession();
      const second = manager.createSession();
      await manager.connect(first.id, 'localhost:1');
      await manager.connect(second.id, 'localhost:2');

      await manager.destroySession(first.id);

      expect(spawner.processes[0].signals).toEqual(['SIGTERM']);
      expect(spawner.processes[1].signals).toEqual([]);
      expect(manager.getSessionInfo(second.id).state).toBe(SessionState.CONNECTED);
      await expect(manager.dispatch(second.id, '-gdb-version')).resolves.toMatchObject({ resultClass: 'done' });
    });
  });
});
