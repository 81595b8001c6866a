import pino from 'pino';
import { describe, expect, it } from 'vitest';
import { LogMailer, renderPasswordResetEmail, renderVerificationEmail } from '../resend';

const payload = {
  to: 'teacher@test.com',
  name: 'Test Teacher',
  code: '483920',
  expiresAt: new Date(Date.now() + 10 * 60_000),
};

describe('email templates', () => {
  it('puts the code and expiry into the verification email', () => {
    const email = renderVerificationEmail('Classroom', payload);
    expect(email.subject).toBe('Classroom - Verify your email');
    expect(email.text.trim()).toBe(
      'Hi Test Teacher,\nYour Classroom verification code is 483920. It expires in 10 minutes.'
    );
    expect(email.html).toContain('<b>483920</b>');
  });

  it('renders the reset email', () => {
    const email = renderPasswordResetEmail('Classroom', payload);
    expect(email.subject).toBe('Classroom - Password reset code');
    expect(email.text.trim()).toBe(
      'Hi Test Teacher,\nYour Classroom password reset code is 483920. It expires in 10 minutes.'
    );
  });

  it('escapes the name in html', () => {
    const email = renderVerificationEmail('Classroom', { ...payload, name: '<Ms. "O\'Hara">' });
    expect(email.html).toContain('Welcome to Classroom, &lt;Ms. &quot;O&#39;Hara&quot;&gt;!');
  });

  it('never promises less than a minute', () => {
    const email = renderVerificationEmail('Classroom', { ...payload, expiresAt: new Date(0) });
    expect(email.text).toContain('It expires in 1 minute.');
  });
});

describe('LogMailer', () => {
  it('reports success without delivering anything', async () => {
    const mailer = new LogMailer(pino({ level: 'silent' }));
    await expect(mailer.sendVerificationCode(payload)).resolves.toEqual({ success: true });
    await expect(mailer.sendPasswordResetCode(payload)).resolves.toEqual({ success: true });
  });
});
