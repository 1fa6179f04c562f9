import { REST, Routes } from "discord.js";
import dotenv from "dotenv";
import { connectCommandData } from "./commands/connect";
import { disconnectCommandData } from "./commands/disconnect";
import { sayCommandData } from "./commands/say";
import { voiceCommandData } from "./commands/voice";

dotenv.config();

const commands = [
  connectCommandData.toJSON(),
  disconnectCommandData.toJSON(),
  sayCommandData.toJSON(),
  voiceCommandData.toJSON(),
];

function requireEnv(name: string): string {
  const value = process.env[name]?.trim();
  if (!value) {
    throw new Error(`環境変数 ${name} が設定されていません。`);
  }
  return value;
}

async function main() {
  const rest = new REST().setToken(requireEnv("TOKEN"));
  await rest.put(
    Routes.applicationGuildCommands(requireEnv("CLIENT_ID"), requireEnv("GUILD_ID")),
    { body: commands }
  );

  console.log("コマンドは正常にデプロイされました。");
}

main().catch((e) => {
  console.error("エラーが発生しました。", e);
  process.exitCode = 1;
});
