import type { NfcTransceiver } from "../../src/lib/tag-auth-relay.js";

/**
 * Answers transceive calls from a queue and records the commands
 */
export class ScriptedTransceiver implements NfcTransceiver {
  public commands: Uint8Array[] = [];

  constructor(private answers: Array<Uint8Array | Error> = []) {}

  push(...answers: Array<Uint8Array | Error>): void {
    this.answers.push(...answers);
  }

  async transceive(command: Uint8Array): Promise<Uint8Array> {
    this.commands.push(command.slice());
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error("No scripted answer");
    }
    if (answer instanceof Error) {
      throw answer;
    }
    return answer;
  }
}
