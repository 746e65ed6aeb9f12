import { text as readStream } from "node:stream/consumers";
import { parseArgs } from "node:util";
import { ConfigError, findAndLoadConfig } from "../../config/loader";
import { createCredentialCipher, ENCRYPTION_KEY_ENV, generateEncryptionKey } from "../../utils/crypto";
import { errorMessage } from "../../utils/errors";
import { color, ui } from "../ui";

/**
 * Key from the config file when one is found, else the environment
 */
async function configuredKey(configPath: string | undefined): Promise<string | undefined> {
  try {
    return (await findAndLoadConfig(configPath)).security.encryptionKey;
  } catch (error) {
    if (error instanceof ConfigError && !configPath) {
      return undefined;
    }
    throw error;
  }
}

async function readPassword(): Promise<string | null> {
  if (!process.stdin.isTTY) {
    return (await readStream(process.stdin)).replace(/\r?\n$/, "");
  }

  const answer = await ui.password({
    message: "Database password",
    validate: (value) => (value.length === 0 ? "Password cannot be empty" : undefined),
  });
  return ui.isCancel(answer) ? null : answer;
}

export async function encryptPasswordCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      "generate-key": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  if (values["generate-key"]) {
    console.log(generateEncryptionKey());
    return 0;
  }

  try {
    const cipher = createCredentialCipher(await configuredKey(values.config));
    const password = await readPassword();
    if (password === null) {
      ui.cancel("Cancelled");
      return 0;
    }
    if (password.length === 0) {
      ui.error("Password cannot be empty");
      return 1;
    }

    console.log(cipher.encrypt(password));
    return 0;
  } catch (error) {
    ui.error(`Encryption failed: ${errorMessage(error)}`);
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("backhaul encrypt-password")} - Encrypt a database password for storage

${color.dim("USAGE:")}
  backhaul encrypt-password [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file
      --generate-key      Print a new random encryption key and exit
  -h, --help              Show this help message

${color.dim("DESCRIPTION:")}
  Reads the password from a prompt, or from stdin when it is not a terminal,
  and prints the value to store in a task's password_encrypted column. The
  key comes from security.encryptionKey or ${ENCRYPTION_KEY_ENV}.

${color.dim("EXAMPLES:")}
  backhaul encrypt-password --generate-key
  printf '%s' "$PW" | backhaul encrypt-password
`);
}
