import { useEffect, useState, type FormEvent } from 'react';
import { CredentialsAPI } from '../api/searchApi';
import type { CredentialStatus } from '../types/search';

const SOURCE_LABELS: Record<CredentialStatus['source'], string> = {
  session: 'applied in this session',
  'secret-store': 'read from the secrets file',
  environment: 'read from environment variables',
  none: 'not configured'
};

interface CredentialsPanelProps {
  onApplied?: () => void;
}

export function CredentialsPanel({ onApplied }: CredentialsPanelProps) {
  const [status, setStatus] = useState<CredentialStatus | null>(null);
  const [clientId, setClientId] = useState('');
  const [clientSecret, setClientSecret] = useState('');
  const [message, setMessage] = useState<string | null>(null);

  useEffect(() => {
    CredentialsAPI.status()
      .then(setStatus)
      .catch(() => setMessage('Could not read the credential status'));
  }, []);

  const handleSubmit = async (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    try {
      setStatus(await CredentialsAPI.apply(clientId, clientSecret));
      setClientSecret('');
      setMessage('Credentials applied to the running session.');
      onApplied?.();
    } catch (err) {
      setMessage(err instanceof Error ? err.message : 'Could not apply the credentials');
    }
  };

  const handleClear = async () => {
    try {
      setStatus(await CredentialsAPI.clear());
      setMessage('Session credentials cleared.');
      onApplied?.();
    } catch (err) {
      setMessage(err instanceof Error ? err.message : 'Could not clear the credentials');
    }
  };

  return (
    <aside className="credentials-panel">
      <h2>API credentials</h2>
      <p role="status">{status ? `Credentials ${SOURCE_LABELS[status.source]}` : 'Checking credentials...'}</p>
      <form onSubmit={handleSubmit}>
        <label>
          Client ID
          <input type="password" autoComplete="off" value={clientId} onChange={(event) => setClientId(event.target.value)} />
        </label>
        <label>
          Client secret
          <input
            type="password"
            autoComplete="off"
            value={clientSecret}
            onChange={(event) => setClientSecret(event.target.value)}
          />
        </label>
        <button type="submit">Apply</button>
        {status?.source === 'session' && (
          <button type="button" onClick={handleClear}>
            Clear session
          </button>
        )}
      </form>
      {message && <p className="credentials-panel__message">{message}</p>}
      <p className="credentials-panel__hint">Identical requests are cached for 10 minutes to save quota.</p>
    </aside>
  );
}
