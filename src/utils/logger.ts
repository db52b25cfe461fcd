import chalk from "chalk";
import ora, { type Ora } from "ora";

export const log = {
  info: (msg: string) => console.log(chalk.blue("info") + " " + msg),
  success: (msg: string) => console.log(chalk.green("done") + " " + msg),
  fail: (msg: string) => console.error(chalk.red("fail") + " " + msg),
  heading: (msg: string) => console.log("\n" + chalk.bold(msg)),
};

export function spinner(text: string): Ora {
  return ora({ text, color: "cyan" }).start();
}
