import {
  ChatCompletionClient,
  OpenAiEmailGeneratorAdapter,
} from '../../../src/infrastructure/adapters/openai-email-generator.adapter';
import { CompanyProfile } from '../../../src/domain/entities/company-profile.entity';
import { SenderInfo } from '../../../src/domain/ports/email-generator.port';
import { configWith } from '../../helpers/fake-page-fetcher';

const sender: SenderInfo = { name: 'Jordan Lee', company: 'Northwind AI', specialization: 'AI automation' };

describe('OpenAiEmailGeneratorAdapter', () => {
  let profile: CompanyProfile;
  let create: jest.Mock;
  let adapter: OpenAiEmailGeneratorAdapter;

  beforeEach(() => {
    profile = new CompanyProfile('https://acme.example/');
    profile.name = 'Acme Robotics';
    create = jest.fn();
    const client: ChatCompletionClient = { chat: { completions: { create } } };
    adapter = new OpenAiEmailGeneratorAdapter(client, configWith({ outreach: { openai: { model: 'gpt-test' } } }));
  });

  it('parses the model completion', async () => {
    create.mockResolvedValue({ choices: [{ message: { content: 'Subject: Less downtime at Acme\n\nHi team' } }] });

    const email = await adapter.generate(profile, sender);

    expect(email).toEqual({ subject: 'Less downtime at Acme', body: 'Hi team' });
    expect(create).toHaveBeenCalledWith(expect.objectContaining({ model: 'gpt-test' }));
  });

  it('falls back when the request fails', async () => {
    create.mockRejectedValue(new Error('rate limited'));

    const email = await adapter.generate(profile, sender);

    expect(email.subject).toBe('AI Solutions for Acme Robotics');
  });

  it('falls back on an empty completion', async () => {
    create.mockResolvedValue({ choices: [{ message: { content: null } }] });

    const email = await adapter.generate(profile, sender);

    expect(email.subject).toBe('AI Solutions for Acme Robotics');
  });

  it('falls back without calling anything when no client is configured', async () => {
    const offline = new OpenAiEmailGeneratorAdapter(null, configWith({}));

    const email = await offline.generate(profile, sender);

    expect(email.subject).toBe('AI Solutions for Acme Robotics');
    expect(create).not.toHaveBeenCalled();
  });
});
