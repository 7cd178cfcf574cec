// server/src/models/TeamLine.ts

import {
  Model, InferAttributes, InferCreationAttributes, CreationOptional,
  DataTypes, ForeignKey, Sequelize
} from 'sequelize';
import type { Team } from './Team.js';
import type { Player } from './Player.js';
import { DEFENSE_POSITIONS, FORWARD_POSITIONS } from '../simulation/types.js';

// Line membership is supplied, never inferred.
export class TeamLine
  extends Model<InferAttributes<TeamLine>, InferCreationAttributes<TeamLine>> {
  declare id: CreationOptional<number>;
  declare teamId: ForeignKey<Team['teamId']>;
  declare situation: string; // 'ES_L1'..'ES_L4' for even strength, 'G' for goaltenders
  declare position: string;  // 'LW', 'C', 'RW', 'LD', 'RD', 'G'
  declare playerId: ForeignKey<Player['playerId']> | null;
  declare lineOrder: number; // 1 = starter for 'G'
}

export function initTeamLine(sequelize: Sequelize) {
  TeamLine.init(
    {
      id: { type: DataTypes.INTEGER, autoIncrement: true, primaryKey: true },
      teamId: { type: DataTypes.INTEGER, allowNull: false },
      situation: { type: DataTypes.STRING(50), allowNull: false },
      position: {
        type: DataTypes.STRING(10),
        allowNull: false,
        validate: { isIn: [[...FORWARD_POSITIONS, ...DEFENSE_POSITIONS, 'G']] }
      },
      playerId: { type: DataTypes.INTEGER, allowNull: true },
      lineOrder: { type: DataTypes.INTEGER, allowNull: false, defaultValue: 1 }
    },
    {
      sequelize,
      tableName: 'team_lines',
      modelName: 'TeamLine',
      timestamps: true,
      indexes: [
        { fields: ['teamId'] },
        { fields: ['playerId'] },
        { fields: ['teamId', 'situation', 'position'] }
      ]
    }
  );
  return TeamLine;
}
