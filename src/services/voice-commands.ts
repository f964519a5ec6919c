/**
 * Map a recognized voice command onto one of the known commands
 */
export function matchVoiceCommand(recognized: string, commands: readonly string[]): string | null {
  if (!recognized) return null;

  const spoken = recognized.toLowerCase().trim();
  if (!spoken) return null;

  if (commands.includes(spoken)) return spoken;

  // The command may be part of a longer phrase, or the other way round
  return commands.find((command) => spoken.includes(command) || command.includes(spoken)) ?? null;
}
