import { SessionManager } from '../../src/services/streaming/SessionManager';
import { StreamSocket, StreamingGateway } from '../../src/services/streaming.gateway';
import { FakeAdapter, flush, pcm, scripted, timing } from '../helpers/fakeAdapter';

class FakeSocket implements StreamSocket {
  readonly id = 'socket-test';
  readonly sent: Array<{ event: string; payload: unknown }> = [];
  private readonly listeners = new Map<string, (payload?: unknown) => void>();

  on(event: string, listener: (payload?: unknown) => void): this {
    this.listeners.set(event, listener);
    return this;
  }

  emit(event: string, payload: unknown): boolean {
    this.sent.push({ event, payload });
    return true;
  }

  /** Deliver an event from the client. */
  receive(event: string, payload?: unknown): void {
    const listener = this.listeners.get(event);
    if (!listener) throw new Error(`no listener for ${event}`);
    listener(payload);
  }

  payloads(event: string): unknown[] {
    return this.sent.filter((s) => s.event === event).map((s) => s.payload);
  }
}

function sessionIdOf(socket: FakeSocket): string {
  const [payload] = socket.payloads('session');
  if (typeof payload === 'object' && payload !== null && 'sessionId' in payload && typeof payload.sessionId === 'string') {
    return payload.sessionId;
  }
  throw new Error('no session opened');
}

async function until(condition: () => boolean): Promise<void> {
  for (let i = 0; i < 50 && !condition(); i++) await flush();
  if (!condition()) throw new Error('condition not reached');
}

const chunk = (bytes: number, seq?: number) => ({
  type: 'audio_chunk',
  data: pcm(bytes, 1).toString('base64'),
  format: 'pcm_s16le',
  sample_rate: 16000,
  seq,
});

function connect(adapter: FakeAdapter) {
  const sessions = new SessionManager({ adapter, streaming: timing });
  const socket = new FakeSocket();
  new StreamingGateway(sessions).handleConnection(socket);
  return { sessions, socket };
}

describe('StreamingGateway', () => {
  test('start, stream and end deliver acks, updates and the final transcript in order', async () => {
    const adapter = new FakeAdapter(scripted('hello there'));
    const { sessions, socket } = connect(adapter);

    socket.receive('start', { format: 'pcm_s16le', sample_rate: 16000 });
    socket.receive('audio_chunk', chunk(64000, 0));
    socket.receive('end');
    await until(() => socket.payloads('final').length > 0);

    const sessionId = sessionIdOf(socket);
    expect(socket.sent).toEqual([
      { event: 'session', payload: { sessionId } },
      { event: 'ack', payload: { chunk: 0, bufferedBytes: 64000 } },
      {
        event: 'transcript',
        payload: { delta: 'hello there', transcript: 'hello there', is_final: false, discontinuity: false },
      },
      { event: 'final', payload: { transcript: 'hello there', is_final: true } },
    ]);
    expect(sessions.getSnapshot(sessionId).closeReason).toBe('ended');
    expect(adapter.calls).toHaveLength(1);
  });

  test('the first audio_chunk opens a session when start was not sent', async () => {
    const { socket } = connect(new FakeAdapter(scripted()));

    socket.receive('audio_chunk', chunk(100));
    await until(() => socket.payloads('ack').length > 0);

    expect(socket.sent[0].event).toBe('session');
    expect(socket.payloads('ack')).toEqual([{ chunk: 0, bufferedBytes: 100 }]);
  });

  test('disconnect drops the session without a final', async () => {
    const { sessions, socket } = connect(new FakeAdapter(scripted('never')));

    socket.receive('start', { format: 'pcm_s16le', sample_rate: 16000 });
    socket.receive('audio_chunk', chunk(100, 0));
    socket.receive('disconnect');
    await flush();

    const snapshot = sessions.getSnapshot(sessionIdOf(socket));
    expect(snapshot.state).toBe('CLOSED');
    expect(snapshot.closeReason).toBe('disconnected');
    expect(socket.payloads('final')).toEqual([]);
  });

  test('end without a session is an error', () => {
    const { socket } = connect(new FakeAdapter(scripted()));

    socket.receive('end');

    expect(socket.sent).toEqual([{ event: 'error', payload: { code: 'NoAudio', message: 'No audio data received' } }]);
  });

  test('an out-of-order chunk is a notice and the session stays open', () => {
    const { sessions, socket } = connect(new FakeAdapter(scripted()));

    socket.receive('audio_chunk', chunk(100, 0));
    socket.receive('audio_chunk', chunk(100, 3));

    expect(socket.payloads('notice')).toEqual([
      { code: 'OutOfOrderChunk', message: 'Out-of-order chunk: expected seq 1, received 3' },
    ]);
    expect(sessions.getSnapshot(sessionIdOf(socket)).state).toBe('OPEN');
  });

  test('malformed messages and unsupported formats are errors', () => {
    const { socket } = connect(new FakeAdapter(scripted()));

    socket.receive('audio_chunk', { data: 'AAAA' });
    socket.receive('start', { format: 'pcm_s16le', sample_rate: 44100 });
    socket.receive('start', { format: 'pcm_s16le', sample_rate: 16000 });
    socket.receive('start', { format: 'pcm_s16le', sample_rate: 16000 });

    expect(socket.payloads('error')).toEqual([
      { code: 'InvalidMessage', message: 'audio_chunk requires data, format and sample_rate' },
      { code: 'UnsupportedFormat', message: 'Unsupported audio format: pcm_s16le 44100Hz x1' },
      { code: 'SessionExists', message: 'A session is already active on this connection' },
    ]);
  });
});
