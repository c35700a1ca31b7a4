export type Command =
  | "toggle-camera"
  | "toggle-color"
  | "next-charset"
  | "previous-charset"
  | "increase-scale"
  | "decrease-scale"
  | "force-stop"
  | "reset-camera"
  | "cycle-pattern"
  | "toggle-help"
  | "quit";

export interface KeyBinding {
  key: string;
  command: Command;
  label: string;
  /** Left out of the help overlay when another key already documents the command. */
  hidden?: boolean;
}

// Key names as terminal-kit reports them.
export const KEY_BINDINGS: KeyBinding[] = [
  { key: " ", command: "toggle-camera", label: "Start/stop camera" },
  { key: "c", command: "toggle-color", label: "Toggle color" },
  { key: "s", command: "next-charset", label: "Next character set" },
  { key: "a", command: "previous-charset", label: "Previous character set" },
  { key: "+", command: "increase-scale", label: "Increase scale" },
  { key: "=", command: "increase-scale", label: "Increase scale", hidden: true },
  { key: "-", command: "decrease-scale", label: "Decrease scale" },
  { key: "x", command: "force-stop", label: "Force stop camera" },
  { key: "r", command: "reset-camera", label: "Reset failed camera" },
  { key: "p", command: "cycle-pattern", label: "Cycle pattern (mock)" },
  { key: "h", command: "toggle-help", label: "Toggle help" },
  { key: "q", command: "quit", label: "Quit" },
  { key: "CTRL_C", command: "quit", label: "Quit", hidden: true },
];

const keyToCommand = new Map<string, Command>();
for (const binding of KEY_BINDINGS) {
  keyToCommand.set(binding.key, binding.command);
}

export function getCommand(keyName: string): Command | undefined {
  return keyToCommand.get(keyName);
}

export function keyLabel(key: string): string {
  return key === " " ? "SPACE" : key.toUpperCase();
}

export function helpLines(): string[] {
  return KEY_BINDINGS.filter((binding) => !binding.hidden).map(
    (binding) => `${keyLabel(binding.key).padEnd(8)} ${binding.label}`,
  );
}
