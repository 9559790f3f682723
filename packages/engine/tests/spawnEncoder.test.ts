import { ChildProcess, spawn } from 'child_process';
import { PassThrough } from 'stream';
import { SpawnEncoder } from '../src/export/syroEncoder';
import { EncoderFailedError, UnsupportedPlatformError } from '../src/util/errors';

jest.mock('child_process', () => ({
  ...jest.requireActual<typeof import('child_process')>('child_process'),
  spawn: jest.fn(),
}));

const spawnMock = jest.mocked(spawn);

interface FakeChild {
  child: ChildProcess;
  stdout: PassThrough;
  stderr: PassThrough;
}

// an unspawned ChildProcess with piped streams; events are driven by the test
function fakeChild(): FakeChild {
  const child = new ChildProcess();
  const stdout = new PassThrough();
  const stderr = new PassThrough();
  child.stdout = stdout;
  child.stderr = stderr;
  spawnMock.mockReturnValueOnce(child);
  return { child, stdout, stderr };
}

function startEncode(): Promise<void> {
  const encoder = new SpawnEncoder({ executable: '/opt/syro/encoder' });
  return encoder.encode({ output: 'song.wav', tokens: ['p01:song_p01.dat', 'p03:song_p03.dat'], cwd: '/tmp/work' });
}

describe('SpawnEncoder', () => {
  afterEach(() => {
    spawnMock.mockReset();
  });

  test('passes the output then the pattern tokens to the executable', async () => {
    const { child, stdout } = fakeChild();
    const done = startEncode();
    stdout.emit('data', Buffer.from('writing song.wav\n'));
    child.emit('close', 0);

    await expect(done).resolves.toBeUndefined();
    expect(spawnMock).toHaveBeenCalledTimes(1);
    expect(spawnMock).toHaveBeenCalledWith(
      '/opt/syro/encoder',
      ['song.wav', 'p01:song_p01.dat', 'p03:song_p03.dat'],
      { cwd: '/tmp/work', stdio: 'pipe' },
    );
  });

  test('a missing executable is an unsupported platform', async () => {
    const { child } = fakeChild();
    const done = startEncode();
    child.emit('error', Object.assign(new Error('spawn /opt/syro/encoder ENOENT'), { code: 'ENOENT' }));

    await expect(done).rejects.toThrow(UnsupportedPlatformError);
    await expect(done).rejects.toThrow("syro encoder '/opt/syro/encoder' was not found");
  });

  test('any other start failure is an encoder failure without an exit code', async () => {
    const { child } = fakeChild();
    const done = startEncode();
    child.emit('error', Object.assign(new Error('permission denied'), { code: 'EACCES' }));

    await expect(done).rejects.toMatchObject({
      code: 'ENCODER_FAILED',
      exitCode: null,
      message: "failed to start syro encoder '/opt/syro/encoder': permission denied",
    });
  });

  test('a nonzero exit carries the code and the trimmed stderr text', async () => {
    const { child, stderr } = fakeChild();
    const done = startEncode();
    stderr.emit('data', Buffer.from('cannot read '));
    stderr.emit('data', Buffer.from('song_p03.dat\n'));
    child.emit('close', 3);

    await expect(done).rejects.toThrow(EncoderFailedError);
    await expect(done).rejects.toMatchObject({
      exitCode: 3,
      message: 'syro encoder exited with code 3: cannot read song_p03.dat',
    });
  });

  test('a nonzero exit with nothing on stderr has no detail', async () => {
    const { child } = fakeChild();
    const done = startEncode();
    child.emit('close', 1);

    await expect(done).rejects.toMatchObject({ exitCode: 1, message: 'syro encoder exited with code 1' });
  });
});
