export type AppFeatureChoice = "measure" | "verify" | "record" | "exit";

export interface TuiUi {
  printHeader(title: string): void;
  printInfo(message: string): void;
  printSuccess(message: string): void;
  printWarning(message: string): void;
  printError(message: string): void;

  chooseAppFeature(): Promise<AppFeatureChoice>;
  /** Resolves null when the prompt is cancelled. */
  askAngle(message: string): Promise<string | null>;
  askNote(): Promise<string | null>;
  confirmRecord(summary: string): Promise<boolean>;
}
