import type React from 'react';

/**
 * Card component props.
 */
export interface CardProps extends React.HTMLAttributes<HTMLElement> {
  as?: 'div' | 'section' | 'article';
}

/**
 * Reusable card component for content containers.
 */
export function Card({ as: Tag = 'div', className = '', children, ...props }: CardProps) {
  return (
    <Tag className={`tutor-card ${className}`.trim()} {...props}>
      {children}
    </Tag>
  );
}
