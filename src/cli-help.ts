export const getCliHelp = (): string => `verdi-board: terminal dashboard for verdi

Usage:
  verdi-board [command] [options]

Commands:
  (default) dashboard     open the dashboard
  snapshot                print each panel's first tab and exit

Options:
  --interval <seconds>    auto-refresh interval (0 disables)
  --focus <0-5>           panel focused on startup
  --verdi-command <cmd>   command used to invoke verdi
  --no-auto-refresh       do not start auto-refresh on startup
  --panel <1-5>           snapshot a single panel
  -h, --help

Keys:
  0-5 focus  [ ] tabs  r refresh  a auto-refresh  j k h l scroll  g G top/bottom
  ? help  q quit
`;
