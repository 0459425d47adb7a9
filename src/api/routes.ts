import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z, ZodError } from 'zod';
import { AppConfig } from '../config.js';
import { DomainError, ErrorCode, toErrorEnvelope } from '../errors/taxonomy.js';
import { AdminService } from '../services/adminService.js';
import { CALLER_HEADER, resolveCaller } from '../services/auth.js';
import { GovernanceService } from '../services/governanceService.js';
import { HolderService } from '../services/holderService.js';
import { VotingService } from '../services/votingService.js';
import { connectedClients } from './websocket.js';

interface RouteDeps {
  config: AppConfig;
  adminService: AdminService;
  governanceService: GovernanceService;
  votingService: VotingService;
  holderService: HolderService;
  getRuntimeMetrics: () => { uptimeSeconds: number; processPid: number };
}

const amount = z.number().int().nonnegative();
const proposalStatusSchema = z.enum(['draft', 'chosen', 'passed', 'rejected', 'done', 'cancelled']);
const voteMethodSchema = z.enum(['tier_point', 'holding_percentage', 'capped_holding_percentage']);

const proposalContentSchema = z.object({
  title: z.string().min(1).max(200),
  description: z.string().max(10_000).default(''),
  choices: z.array(z.string().min(1).max(120)),
});

const thresholdsSchema = z.object({
  vip: amount,
  gold: amount,
  silver: amount,
  bronze: amount,
});

const maxPercentageSchema = z.object({ value: z.number().int() });

const votingDurationSchema = z.object({ days: z.number().int() });

const voteMethodUpdateSchema = z.object({ method: voteMethodSchema });

const pauseSchema = z.object({ paused: z.boolean() });

const grantAdminSchema = z.object({ account: z.string().min(1).max(200) });

const finalizeSchema = z.object({ status: proposalStatusSchema });

const voteSchema = z.object({ choiceIndex: z.number().int() });

const proposalParamsSchema = z.object({ id: z.coerce.number().int().positive() });

const choiceParamsSchema = proposalParamsSchema.extend({ choiceIndex: z.coerce.number().int().nonnegative() });

const voterParamsSchema = proposalParamsSchema.extend({ voter: z.string().min(1) });

const sessionParamsSchema = z.object({ id: z.coerce.number().int().positive() });

const listProposalsQuerySchema = z.object({
  status: proposalStatusSchema.optional(),
  sessionId: z.coerce.number().int().positive().optional(),
});

const sendDomainError = (reply: FastifyReply, error: unknown): void => {
  if (error instanceof DomainError) {
    void reply.code(error.statusCode).send(toErrorEnvelope(error.code, error.message, error.details));
    return;
  }

  if (error instanceof ZodError) {
    void reply.code(400).send(toErrorEnvelope(ErrorCode.InvalidPayload, 'Invalid request.', error.issues));
    return;
  }

  void reply.code(500).send(toErrorEnvelope(
    ErrorCode.InternalError,
    'Unexpected internal error',
    { error: String(error) },
  ));
};

const callerOf = (request: FastifyRequest): string => resolveCaller(request.headers[CALLER_HEADER]);

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  app.get('/', async () => ({
    name: deps.config.app.name,
    version: '0.1.0',
    status: 'ok',
  }));

  app.get('/health', async () => {
    const params = deps.adminService.getParams();
    return {
      status: 'ok',
      env: deps.config.app.env,
      ...deps.getRuntimeMetrics(),
      paramsVersion: params.version,
      paused: params.paused,
      activeProposalId: params.activeProposalId,
      wsClients: connectedClients(),
    };
  });

  // ─── Params & admin ─────────────────────────────────────────────────

  app.get('/params', async () => ({ params: deps.adminService.getParams() }));

  app.post('/admin/thresholds', async (request, reply) => {
    try {
      const body = thresholdsSchema.parse(request.body);
      return { params: await deps.adminService.updateThresholds(callerOf(request), body) };
    } catch (error) {
      sendDomainError(reply, error);
    }
  });

  app.post('/admin/max-percentage', async (request, reply) => {
    try {
      const body = maxPercentageSchema.parse(request.body);
      return await deps.adminService.setMaxPercentage(callerOf(request), body.value);
    } catch (error) {
      sendDomainError(reply, error);
    }
  });

  app.post('/admin/voting-duration', async (request, reply) => {
    try {
      const body = votingDurationSchema.parse(request.body);
      return { params: await deps.adminService.updateVotingDuration(callerOf(request), body.days) };
    } catch (error) {
      sendDomainError(reply, error);
    }
  });

  app.post('/admin/vote-method', async (request, reply) => {
    try {
      const body = voteMethodUpdateSchema.parse(request.body);
      return { params: await deps.adminService.setVoteMethod(callerOf(request), body.method) };
    } catch (error) {
      sendDomainError(reply, error);
    }
  });

  app.post('/admin/pause', async (request, reply) => {
    try {
      const body = pauseSchema.parse(request.body);
      return { params: await deps.adminService.setPaused(callerOf(request), body.paused) };
    } catch (error) {
      sendDomainError(reply, error);
    }
  });

  app.post('/admin/admins', async (request, reply) => {
    try {
      const body = grantAdminSchema.parse(request.body);
      return { params: await deps.adminService.grantAdmin(callerOf(request), body.account) };
    } catch (error) {
      sendDomainError(reply, error);
    }
  });

  app.delete('/admin/admins/:account', async (request, reply) => {
    try {
      const { account } = z.object({ account: z.string().min(1) }).parse(request.params);
      return { params: await deps.adminService.revokeAdmin(callerOf(request), account) };
    } catch (error) {
      sendDomainError(reply, error);
    }
  });

  // ─── Proposals & sessions ───────────────────────────────────────────

  app.get('/proposals', async (request, reply) => {
    try {
      const query = listProposalsQuerySchema.parse(request.query);
      return { proposals: deps.governanceService.listProposals(query) };
    } catch (error) {
      sendDomainError(reply, error);
    }
  });

  app.get('/proposals/active', async () => {
    const active = deps.governanceService.getActiveProposal();
    return active ?? { proposal: null, expired: false };
  });

  app.post('/proposals', async (request, reply) => {
    try {
      const body = proposalContentSchema.parse(request.body);
      const proposal = await deps.governanceService.createProposal(callerOf(request), body);
      return reply.code(201).send({ proposal });
    } catch (error) {
      sendDomainError(reply, error);
    }
  });

  app.get('/proposals/:id', async (request, reply) => {
    try {
      const { id } = proposalParamsSchema.parse(request.params);
      const proposal = deps.governanceService.getProposal(id);
      if (!proposal) {
        throw new DomainError(ErrorCode.ProposalNotFound, 404, 'Proposal not found.', { proposalId: id });
      }
      return { proposal };
    } catch (error) {
      sendDomainError(reply, error);
    }
  });

  app.post('/proposals/:id/select', async (request, reply) => {
    try {
      const { id } = proposalParamsSchema.parse(request.params);
      const body = proposalContentSchema.parse(request.body);
      return await deps.governanceService.selectProposal(callerOf(request), id, body);
    } catch (error) {
      sendDomainError(reply, error);
    }
  });

  app.post('/proposals/:id/cancel', async (request, reply) => {
    try {
      const { id } = proposalParamsSchema.parse(request.params);
      return { proposal: await deps.governanceService.cancelProposal(callerOf(request), id) };
    } catch (error) {
      sendDomainError(reply, error);
    }
  });

  app.post('/proposals/:id/status', async (request, reply) => {
    try {
      const { id } = proposalParamsSchema.parse(request.params);
      const body = finalizeSchema.parse(request.body);
      return { proposal: await deps.governanceService.finalizeStatus(callerOf(request), id, body.status) };
    } catch (error) {
      sendDomainError(reply, error);
    }
  });

  app.get('/sessions/current', async () => ({ session: deps.governanceService.getCurrentSession() }));

  app.get('/sessions/:id', async (request, reply) => {
    try {
      const { id } = sessionParamsSchema.parse(request.params);
      const session = deps.governanceService.getSession(id);
      if (!session) {
        throw new DomainError(ErrorCode.SessionNotFound, 404, 'Session not found.', { sessionId: id });
      }
      return { session };
    } catch (error) {
      sendDomainError(reply, error);
    }
  });

  // ─── Voting & results ───────────────────────────────────────────────

  app.post('/proposals/:id/votes', async (request, reply) => {
    try {
      const { id } = proposalParamsSchema.parse(request.params);
      const body = voteSchema.parse(request.body);
      const vote = await deps.votingService.vote(callerOf(request), id, body.choiceIndex);
      return reply.code(201).send({ vote });
    } catch (error) {
      sendDomainError(reply, error);
    }
  });

  app.get('/proposals/:id/votes', async (request, reply) => {
    try {
      const { id } = proposalParamsSchema.parse(request.params);
      return { votes: deps.votingService.listVotes(id) };
    } catch (error) {
      sendDomainError(reply, error);
    }
  });

  app.get('/proposals/:id/votes/:voter', async (request, reply) => {
    try {
      const { id, voter } = voterParamsSchema.parse(request.params);
      return { vote: deps.votingService.getVote(id, voter) };
    } catch (error) {
      sendDomainError(reply, error);
    }
  });

  app.get('/proposals/:id/tallies', async (request, reply) => {
    try {
      const { id } = proposalParamsSchema.parse(request.params);
      return deps.votingService.getAllTallies(id);
    } catch (error) {
      sendDomainError(reply, error);
    }
  });

  app.get('/proposals/:id/tallies/:choiceIndex', async (request, reply) => {
    try {
      const { id, choiceIndex } = choiceParamsSchema.parse(request.params);
      return deps.votingService.getProposalVote(id, choiceIndex);
    } catch (error) {
      sendDomainError(reply, error);
    }
  });

  app.get('/proposals/:id/winner', async (request, reply) => {
    try {
      const { id } = proposalParamsSchema.parse(request.params);
      return deps.votingService.getWinner(id);
    } catch (error) {
      sendDomainError(reply, error);
    }
  });

  // ─── Holders ────────────────────────────────────────────────────────

  app.get('/holders/:account', async (request, reply) => {
    try {
      const { account } = z.object({ account: z.string().min(1) }).parse(request.params);
      return { holder: await deps.holderService.getStanding(account) };
    } catch (error) {
      sendDomainError(reply, error);
    }
  });
}
