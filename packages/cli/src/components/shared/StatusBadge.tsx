import React from 'react';
import { Text } from 'ink';
import type { RecordStatus } from '@taskdeck/core';
import { STATUS_ICONS } from '../../utils/format';

interface StatusBadgeProps {
  status: RecordStatus;
  count?: number;
}

const STATUS_COLORS: Record<RecordStatus, string> = {
  active: 'blue',
  next: 'yellow',
  waiting: 'magenta',
  done: 'green',
  archived: 'gray',
};

/**
 * Colored status label, optionally with the number of records under it.
 */
export const StatusBadge: React.FC<StatusBadgeProps> = ({ status, count }) => (
  <Text color={STATUS_COLORS[status]} bold>
    {STATUS_ICONS[status]} {status.toUpperCase()}
    {count !== undefined ? ` (${count})` : ''}
  </Text>
);
