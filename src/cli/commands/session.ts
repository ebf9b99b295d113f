import { accountOfType, foClient, type Command } from '../context.js';

// Sessions are not kept between invocations: login proves the credentials
// work and ends the session again.

const login: Command = async (args, ctx) => {
  const account = await accountOfType(args, ctx, 'finanzonline');
  const client = foClient(ctx);
  await client.withLogin(
    { tid: account.tid, benid: account.benid, pin: account.pin },
    async () => undefined,
    { accountName: account.name },
  );
  return {
    data: { status: 'success', account: account.name, tid: account.tid },
    text: `Login for "${account.name}" (TID ${account.tid}) succeeded; session closed again.`,
  };
};

const logout: Command = async () => ({
  data: { status: 'success', sessions: 0 },
  text: 'No open session: every command logs out when it finishes.',
});

export const sessionCommands: Record<string, Command> = { login, logout };
