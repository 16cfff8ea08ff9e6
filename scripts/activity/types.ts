export type CommitSource = "search" | "fork-branch" | "repo-history";

export type PullRequestState = "OPEN" | "MERGED" | "CLOSED";

export type GatheringMode = "full" | "light";

export interface DateWindow {
  /** Inclusive, YYYY-MM-DD */
  since: string;
  /** Inclusive, YYYY-MM-DD */
  until: string;
}

export interface RepoInfo {
  nameWithOwner: string;
  description: string | null;
  isFork: boolean;
  isPrivate: boolean;
  parent: string | null;
  primaryLanguage: string | null;
  defaultBranch?: string | null;
}

export interface DiscoveredCommit {
  sha: string;
  /** Repository the commit was found in; may be a fork. */
  repo: string;
  authorLogin: string | null;
  committedAt: string | null;
  /** null when the commit sits on the default branch */
  branch: string | null;
  source: CommitSource;
}

export interface CommitRecord {
  sha: string;
  /** Credited repository: the parent when the commit was found in a fork. */
  repo: string;
  /** Repository the commit lives in, used as the address for stat lookups. */
  originRepo: string;
  authorLogin: string | null;
  committedAt: string | null;
  additions: number | null;
  deletions: number | null;
  branch: string | null;
  source: CommitSource;
}

export interface CommitStats {
  additions: number;
  deletions: number;
}

export interface RepoActivity {
  name: string;
  commits: number;
  additions: number;
  deletions: number;
  pullRequests: number;
  category: string;
  language: string | null;
  description: string | null;
  isFork: boolean;
  parent: string | null;
}

export interface LanguageStat {
  language: string;
  commits: number;
  additions: number;
  deletions: number;
  repos: number;
}

export interface PullRequestRecord {
  url: string;
  title: string;
  repo: string;
  authorLogin: string | null;
  additions: number;
  deletions: number;
  reviewCount: number;
  state: PullRequestState;
  createdAt: string | null;
}

export interface ActivityTotals {
  commitsDefaultBranch: number;
  commitsAllBranches: number;
  pullRequestsCreated: number;
  pullRequestsReviewed: number;
  /** Reviews left by others on the pull requests the subject opened. */
  reviewsReceived: number;
  issues: number;
  additions: number;
  deletions: number;
  reposContributed: number;
}

export interface MemberActivity {
  login: string;
  realName: string | null;
  company: string | null;
  window: DateWindow;
  totals: ActivityTotals;
  repos: RepoActivity[];
  languages: LanguageStat[];
  pullRequestsCreated: PullRequestRecord[];
  pullRequestsReviewed: PullRequestRecord[];
  light: boolean;
  complete: boolean;
  failure?: string;
}

export interface MemberDisplay {
  realName: string | null;
  company: string;
}

export interface OrgAggregateResult {
  totals: ActivityTotals;
  repos: RepoActivity[];
  languages: LanguageStat[];
  pullRequestsCreated: PullRequestRecord[];
  pullRequestsReviewed: PullRequestRecord[];
  repoMemberCommits: Record<string, Record<string, number>>;
  languageMemberCommits: Record<string, Record<string, number>>;
  companyGroups: Record<string, string[]>;
  members: Record<string, MemberDisplay>;
  failedMembers: string[];
  light: boolean;
}

export interface ScanResult {
  active: string[];
  inactive: string[];
  undetermined: string[];
}

export interface OrganizationActivity {
  org: string;
  team: string | null;
  ownersOnly: boolean;
  window: DateWindow;
  candidates: number;
  scan: ScanResult;
  aggregate: OrgAggregateResult;
  memberResults: MemberActivity[];
}
