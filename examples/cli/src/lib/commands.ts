import { ValidationError, attributeSpec, type AttributeMode, type DirectoryClient } from "directory-rpc-sdk";

export type Command = {
  readonly usage: string;
  readonly run: (client: DirectoryClient, args: readonly string[]) => Promise<unknown>;
};

const ATTRIBUTE_MODES: readonly AttributeMode[] = ["single", "all", "base64", "raw"];

const isAttributeMode = (value: string): value is AttributeMode => ATTRIBUTE_MODES.some((mode) => mode === value);

/**
 * `uid mail:all jpegPhoto:base64` → `{ uid: "single", mail: "all", jpegPhoto: "base64" }`
 */
export const parseAttributes = (args: readonly string[]): Record<string, AttributeMode> => {
  const attributes: Record<string, AttributeMode> = {};
  for (const arg of args) {
    const [name, mode = "single"] = arg.split(":");
    if (!name || !isAttributeMode(mode)) {
      throw new ValidationError(`Invalid attribute "${arg}", expected name[:${ATTRIBUTE_MODES.join("|")}]`);
    }
    attributes[name] = mode;
  }
  return attributes;
};

const arg = (args: readonly string[], index: number, name: string): string => {
  const value = args[index];
  if (value === undefined) {
    throw new ValidationError(`Missing argument <${name}>`);
  }
  return value;
};

export const commands: Readonly<Record<string, Command>> = {
  databases: {
    usage: "databases",
    run: async (client) => client.listDatabases()
  },
  types: {
    usage: "types",
    run: async (client) => client.listObjectTypes()
  },
  base: {
    usage: "base",
    run: async (client) => client.getBase()
  },
  count: {
    usage: "count <type> [filter]",
    run: async (client, args) => client.count(arg(args, 0, "type"), { filter: args[1] })
  },
  ls: {
    usage: "ls <type> [attribute[:mode]...]",
    run: async (client, args) => {
      const attributes = args.slice(1);
      return client.listObjects(arg(args, 0, "type"), {
        attributes: attributes.length > 0 ? attributeSpec(parseAttributes(attributes)) : undefined
      });
    }
  },
  get: {
    usage: "get <type> <dn> [attribute[:mode]...]",
    run: async (client, args) => {
      const attributes = args.slice(2);
      return client.getObject(
        arg(args, 0, "type"),
        arg(args, 1, "dn"),
        attributes.length > 0 ? attributeSpec(parseAttributes(attributes)) : undefined
      );
    }
  },
  tabs: {
    usage: "tabs <type> [dn]",
    run: async (client, args) => client.listTabs(arg(args, 0, "type"), args[1])
  },
  delete: {
    usage: "delete <type> <dn>",
    run: async (client, args) => client.deleteObject(arg(args, 0, "type"), arg(args, 1, "dn"))
  },
  lock: {
    usage: "lock <dn>",
    run: async (client, args) => client.lockUser(arg(args, 0, "dn"))
  },
  unlock: {
    usage: "unlock <dn>",
    run: async (client, args) => client.unlockUser(arg(args, 0, "dn"))
  },
  locked: {
    usage: "locked <dn>",
    run: async (client, args) => client.userIsLocked(arg(args, 0, "dn"))
  }
};

export const usage = (): string =>
  ["Usage: directory-cli <command> [args]", "", ...Object.values(commands).map((command) => `  ${command.usage}`)].join("\n");
