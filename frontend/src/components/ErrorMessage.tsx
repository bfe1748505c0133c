interface ErrorMessageProps {
  message: string;
}

export function ErrorMessage({ message }: ErrorMessageProps) {
  return (
    <div className="error-message" role="alert">
      <div className="error-content">
        <span className="error-icon">🚨</span>
        <pre>{message}</pre>
      </div>
    </div>
  );
}
