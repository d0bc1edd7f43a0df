import { BaseView } from './BaseView';
import type { User } from '../types';

export interface UserResponseDTO {
  id: number;
  name: string;
}

export class UserView extends BaseView<User, UserResponseDTO> {
  format(user: User): UserResponseDTO {
    return {
      id: user.id,
      name: user.name,
    };
  }
}
