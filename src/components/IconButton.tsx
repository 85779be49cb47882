import React from 'react';

export default function IconButton({
  label, onClick, children,
}: {
  label: string;
  onClick?: () => void;
  children: React.ReactNode;
}) {
  return (
    <button
      type="button"
      aria-label={label}
      onClick={onClick}
      className="flex h-7 w-7 items-center justify-center rounded-full text-white/60 hover:text-white/90"
    >
      {children}
    </button>
  );
}
