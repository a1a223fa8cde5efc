/** Maps the backend's most common failures to short setup hints for the diagnostics panel. */
export const formatErrorMessage = ({
  commandName,
  error,
}: {
  commandName: string;
  error: string;
}): string => {
  const name = commandName.toLowerCase();
  if (name.includes("profile") || error.toLowerCase().includes("profile")) {
    return [
      "No profile configured.",
      "",
      "Please run:",
      "  verdi presto       (for quick setup)",
      "  verdi profile setup (for detailed setup)",
    ].join("\n");
  }
  if (name.includes("computer") && error.includes("No")) {
    return "No computers configured.\n\nUse 'verdi computer setup' to add computers.";
  }
  if (name.includes("process") && error.includes("No")) {
    return "No processes found.\n\nSubmit calculations to see them here.";
  }
  return error.length > 0 ? error : "Command failed";
};
