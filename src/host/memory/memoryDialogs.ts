import type { DialogResponses } from "../../types/contracts.js";
import type { DialogProvider } from "../types.js";

export type DialogRecord =
  | { kind: "message"; plugin: string; message: string; buttons: Array<[number, string]>; answer: number }
  | { kind: "saveAs"; suggestion: string; answer: string | undefined }
  | { kind: "openFile"; filters: string[]; answer: string | undefined };

/**
 * Dialogs answered from queues of prepared responses. An empty queue behaves
 * like the user closing the dialog.
 */
export class ScriptedDialogs implements DialogProvider {
  private messageButtons: number[] = [];
  private saveAs: Array<string | null> = [];
  private openFile: Array<string | null> = [];
  private readonly records: DialogRecord[] = [];

  constructor(responses?: DialogResponses) {
    if (responses) {
      this.enqueue(responses);
    }
  }

  enqueue(responses: DialogResponses): void {
    this.messageButtons.push(...responses.messageButtons);
    this.saveAs.push(...responses.saveAs);
    this.openFile.push(...responses.openFile);
  }

  clear(): void {
    this.messageButtons = [];
    this.saveAs = [];
    this.openFile = [];
    this.records.length = 0;
  }

  drainShown(): DialogRecord[] {
    return this.records.splice(0);
  }

  get shown(): readonly DialogRecord[] {
    return this.records;
  }

  showPluginMessage(pluginName: string, message: string, buttons: ReadonlyMap<number, string>): number {
    const answer = this.messageButtons.shift() ?? -1;
    this.records.push({ kind: "message", plugin: pluginName, message, buttons: [...buttons], answer });
    return answer;
  }

  chooseSaveFile(suggestion: string): string | undefined {
    const answer = this.saveAs.shift() ?? undefined;
    this.records.push({ kind: "saveAs", suggestion, answer });
    return answer;
  }

  chooseOpenFile(filters: readonly string[]): string | undefined {
    const answer = this.openFile.shift() ?? undefined;
    this.records.push({ kind: "openFile", filters: [...filters], answer });
    return answer;
  }
}
