import execa, { ExecaReturnValue, Options } from 'execa';
import { DockerHelper } from './helper';

export const docker = async (args: string[], opts = { stdout: true }, execa_opts?: Options): Promise<ExecaReturnValue> => {
  await DockerHelper.verifyDocker();

  const cmd = execa('docker', args, execa_opts);
  if (opts.stdout) {
    cmd.stdout?.pipe(process.stdout);
    cmd.stderr?.pipe(process.stderr);
  }
  return await cmd;
};
