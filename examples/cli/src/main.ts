import { Console } from "node:console";

import { ConsoleLogger, DirectoryClient, isDirectoryRpcError, isLogLevel, loadClientOptionsFromEnv } from "directory-rpc-sdk";

import { commands, usage } from "./lib/commands";

const main = async (): Promise<number> => {
  const [name, ...args] = process.argv.slice(2);
  const command = name === undefined ? undefined : commands[name];
  if (!command) {
    // eslint-disable-next-line no-console
    console.error(usage());
    return 2;
  }

  // stdout carries the command's JSON output
  const level = process.env.FD_LOG_LEVEL;
  const log = new ConsoleLogger({
    prefix: "[directory-cli]",
    level: isLogLevel(level) ? level : "warn",
    output: new Console({ stdout: process.stderr, stderr: process.stderr })
  });
  const client = await DirectoryClient.connect({ ...loadClientOptionsFromEnv(), logger: log });

  try {
    const result = await command.run(client, args);
    // eslint-disable-next-line no-console
    console.log(JSON.stringify(result, null, 2));
    return 0;
  } finally {
    await client.close();
  }
};

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    const message = isDirectoryRpcError(err) ? `${err.name}: ${err.message}` : err;
    // eslint-disable-next-line no-console
    console.error("directory-cli failed:", message);
    process.exitCode = 1;
  });
