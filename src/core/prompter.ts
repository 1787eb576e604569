import inquirer from "inquirer";

export interface Prompter {
  confirm(message: string, defaultValue: boolean): Promise<boolean>;
}

export class InquirerPrompter implements Prompter {
  async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
      {
        type: "confirm",
        name: "confirm",
        message,
        default: defaultValue,
      },
    ]);
    return confirm;
  }
}
