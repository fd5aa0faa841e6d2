/**
 * Wallet routes.
 * Users read their own balance and history; operators credit, refund, verify and
 * unfreeze any wallet.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { requireAdmin, requireUser } from '../middleware/auth.js';
import { parseCredits } from '../lib/money.js';
import type { WalletLedger } from '../services/wallet.js';
import { CreditBodySchema, RefundBodySchema, TransactionsQuerySchema } from '../types/protocol.js';
import { balanceView, parse, sendError, transactionView } from './http.js';

export interface WalletRoutesOptions {
  ledger: WalletLedger;
}

interface UserParams {
  userId: string;
}

export default async function walletRoutes(app: FastifyInstance, opts: WalletRoutesOptions): Promise<void> {
  const { ledger } = opts;

  // ── GET /api/wallets/me ─────────────────────────────────────────────────
  app.get('/api/wallets/me', { onRequest: requireUser }, async (req: FastifyRequest, reply: FastifyReply) => {
    try {
      const balance = await ledger.getBalance(req.user.sub);
      return reply.send({ success: true, wallet: balanceView(balance) });
    } catch (err: unknown) {
      return sendError(reply, err);
    }
  });

  // ── GET /api/wallets/me/transactions ────────────────────────────────────
  app.get(
    '/api/wallets/me/transactions',
    { onRequest: requireUser },
    async (req: FastifyRequest, reply: FastifyReply) => {
      try {
        const query = parse(TransactionsQuerySchema, req.query);
        const txs = await ledger.transactions(req.user.sub, query);
        return reply.send({ success: true, transactions: txs.map(transactionView) });
      } catch (err: unknown) {
        return sendError(reply, err);
      }
    },
  );

  // ── POST /api/wallets/:userId/credits ───────────────────────────────────
  app.post<{ Params: UserParams }>(
    '/api/wallets/:userId/credits',
    { onRequest: requireAdmin },
    async (req: FastifyRequest<{ Params: UserParams }>, reply: FastifyReply) => {
      try {
        const body = parse(CreditBodySchema, req.body);
        const result = await ledger.credit(req.params.userId, parseCredits(body.amount), body.externalRef, body.description);
        return reply.status(result.duplicate ? 200 : 201).send({
          success: true,
          duplicate: result.duplicate,
          wallet: balanceView(result.balance),
          transaction: transactionView(result.transaction),
        });
      } catch (err: unknown) {
        return sendError(reply, err);
      }
    },
  );

  // ── POST /api/wallets/:userId/refunds ───────────────────────────────────
  app.post<{ Params: UserParams }>(
    '/api/wallets/:userId/refunds',
    { onRequest: requireAdmin },
    async (req: FastifyRequest<{ Params: UserParams }>, reply: FastifyReply) => {
      try {
        const body = parse(RefundBodySchema, req.body);
        const result = await ledger.refund(
          req.params.userId,
          parseCredits(body.amount),
          body.jobId ?? null,
          body.externalRef,
          body.reason,
        );
        return reply.status(result.duplicate ? 200 : 201).send({
          success: true,
          duplicate: result.duplicate,
          wallet: balanceView(result.balance),
          transaction: transactionView(result.transaction),
        });
      } catch (err: unknown) {
        return sendError(reply, err);
      }
    },
  );

  // ── POST /api/wallets/:userId/verify ────────────────────────────────────
  app.post<{ Params: UserParams }>(
    '/api/wallets/:userId/verify',
    { onRequest: requireAdmin },
    async (req: FastifyRequest<{ Params: UserParams }>, reply: FastifyReply) => {
      try {
        const audit = await ledger.verify(req.params.userId);
        return reply.send({ success: true, audit });
      } catch (err: unknown) {
        return sendError(reply, err);
      }
    },
  );

  // ── POST /api/wallets/:userId/unfreeze ──────────────────────────────────
  app.post<{ Params: UserParams }>(
    '/api/wallets/:userId/unfreeze',
    { onRequest: requireAdmin },
    async (req: FastifyRequest<{ Params: UserParams }>, reply: FastifyReply) => {
      try {
        const balance = await ledger.unfreeze(req.params.userId, req.user.sub);
        return reply.send({ success: true, wallet: balanceView(balance) });
      } catch (err: unknown) {
        return sendError(reply, err);
      }
    },
  );
}
