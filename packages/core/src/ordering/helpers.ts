import { formatMemberName } from '@adorn/common';

import type { MemberNode } from '../declaration';

import type { ApplicationTarget } from './interfaces';

export function describeMember(member: MemberNode): string {
  const name = formatMemberName(member.name);

  switch (member.kind) {
    case 'constructor':
      return 'constructor';
    case 'method':
      return `method ${name}`;
    case 'static-method':
      return `static method ${name}`;
    case 'setter':
      return `setter ${name}`;
    case 'static-setter':
      return `static setter ${name}`;
  }
}

/**
 * Human readable location of an application target, used in error messages and logs.
 */
export function describeTarget(target: ApplicationTarget, className: string | undefined): string {
  const owner = `class ${className ?? '<anonymous>'}`;

  switch (target.kind) {
    case 'class':
      return owner;
    case 'member':
      return `${describeMember(target.member)} of ${owner}`;
    case 'parameter': {
      const { index, name } = target.parameter;
      const label = name === undefined ? `parameter ${index}` : `parameter ${index} (${name})`;

      return `${label} of ${describeMember(target.member)} of ${owner}`;
    }
  }
}
