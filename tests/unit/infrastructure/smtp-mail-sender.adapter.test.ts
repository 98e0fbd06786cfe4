import * as nodemailer from 'nodemailer';
import { SmtpMailSenderAdapter, createMailTransport } from '../../../src/infrastructure/adapters/smtp-mail-sender.adapter';
import { configWith } from '../../helpers/fake-page-fetcher';

const config = configWith({ outreach: { smtp: { from: 'outreach@northwind.example' } } });

describe('SmtpMailSenderAdapter', () => {
  it('sends through the transport and reports the message id', async () => {
    const transport = nodemailer.createTransport({ jsonTransport: true });
    const sendMail = jest.spyOn(transport, 'sendMail');
    const sender = new SmtpMailSenderAdapter(transport, config);

    const result = await sender.send({
      to: 'ceo@acme.example',
      subject: 'Hello',
      body: 'Body text',
      fromName: 'Jordan Lee',
      cc: ['cto@acme.example', 'cfo@acme.example'],
    });

    expect(result.success).toBe(true);
    expect(result.message).toBe('Email successfully sent to ceo@acme.example');
    expect(result.messageId).toEqual(expect.any(String));
    expect(sendMail).toHaveBeenCalledWith(
      expect.objectContaining({
        from: '"Jordan Lee" <outreach@northwind.example>',
        to: 'ceo@acme.example',
        cc: 'cto@acme.example,cfo@acme.example',
        bcc: undefined,
        text: 'Body text',
      }),
    );
  });

  it('reports transport errors instead of throwing', async () => {
    const transport = nodemailer.createTransport({ jsonTransport: true });
    jest.spyOn(transport, 'sendMail').mockImplementation(() => Promise.reject(new Error('connection refused')));
    const sender = new SmtpMailSenderAdapter(transport, config);

    const result = await sender.send({ to: 'ceo@acme.example', subject: 'Hello', body: 'Body' });

    expect(result).toEqual({ success: false, message: 'Failed to send email: connection refused' });
  });

  it('is not configured without a transport', async () => {
    const sender = new SmtpMailSenderAdapter(null, config);

    expect(sender.isConfigured()).toBe(false);
    expect(await sender.send({ to: 'ceo@acme.example', subject: 'Hello', body: 'Body' })).toEqual({
      success: false,
      message: 'Mail delivery is not configured',
    });
  });

  it('builds no transport when SMTP_HOST is missing', () => {
    expect(createMailTransport(configWith({}))).toBeNull();
    expect(createMailTransport(configWith({ outreach: { smtp: { host: 'smtp.test' } } }))).not.toBeNull();
  });
});
