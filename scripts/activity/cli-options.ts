export interface ScopeOptions {
  user?: string;
  org?: string;
  team?: string;
  owners?: boolean;
  privateMembers?: boolean;
}

/** Throws when the subject flags do not describe exactly one scope. */
export function validateScope(options: ScopeOptions): void {
  if (options.user && options.org) {
    throw new Error("Pass either --user or --org, not both");
  }
  if (!options.user && !options.org) {
    throw new Error("Pass --user <login> or --org <org>");
  }
  if (!options.org) {
    for (const [flag, set] of [
      ["--team", options.team],
      ["--owners", options.owners],
      ["--private-members", options.privateMembers],
    ] as const) {
      if (set) {
        throw new Error(`${flag} needs --org`);
      }
    }
    return;
  }
  if (options.owners && options.team) {
    throw new Error("Pass either --owners or --team, not both");
  }
  if (options.privateMembers && (options.team || options.owners)) {
    throw new Error("--private-members applies to the whole organization; drop --team and --owners");
  }
}
