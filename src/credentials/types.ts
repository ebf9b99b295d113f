export type AccountType = 'finanzonline' | 'elda' | 'firmenbuch';

export const ACCOUNT_TYPES: readonly AccountType[] = ['finanzonline', 'elda', 'firmenbuch'];

export interface FinanzOnlineAccount {
  type: 'finanzonline';
  name: string;
  tid: string;    // Teilnehmer-ID, 12 digits
  benid: string;  // WebService user
  pin: string;
}

export interface EldaAccount {
  type: 'elda';
  name: string;
  dienstgeberNr: string;  // 8 digits
  benutzerNr: string;
  pin: string;
}

export interface FirmenbuchAccount {
  type: 'firmenbuch';
  name: string;
  apiKey: string;
}

export type Account = FinanzOnlineAccount | EldaAccount | FirmenbuchAccount;

/** What `account list` shows: never a PIN or key. */
export interface AccountSummary {
  name: string;
  type: AccountType;
  identifier: string;
}

export interface CredentialStore {
  get(name: string): Promise<Account | undefined>;
  list(): Promise<Account[]>;
  /** Fails on a duplicate name. */
  add(account: Account): Promise<void>;
  remove(name: string): Promise<boolean>;
}
