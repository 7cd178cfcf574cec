// server/src/models/SharedIceStat.ts

import {
  Model, InferAttributes, InferCreationAttributes, CreationOptional,
  DataTypes, ForeignKey, Sequelize
} from 'sequelize';
import type { Game } from './Game.js';
import type { Player } from './Player.js';
import type { Team } from './Team.js';

// One row per game and unordered pair; playerA < playerB
export class SharedIceStat
  extends Model<InferAttributes<SharedIceStat>, InferCreationAttributes<SharedIceStat>> {
  declare id: CreationOptional<number>;
  declare season: number;
  declare gameId: ForeignKey<Game['gameId']>;
  declare teamId: ForeignKey<Team['teamId']>;
  declare playerA: ForeignKey<Player['playerId']>;
  declare playerB: ForeignKey<Player['playerId']>;
  declare timeOnIce: number; // seconds together
  declare goalsFor: number;
  declare shotsFor: number;
}

export function initSharedIceStat(sequelize: Sequelize) {
  SharedIceStat.init(
    {
      id: { type: DataTypes.INTEGER, autoIncrement: true, primaryKey: true },
      season: { type: DataTypes.INTEGER, allowNull: false },
      gameId: { type: DataTypes.INTEGER, allowNull: false },
      teamId: { type: DataTypes.INTEGER, allowNull: false },
      playerA: { type: DataTypes.INTEGER, allowNull: false },
      playerB: { type: DataTypes.INTEGER, allowNull: false },
      timeOnIce: { type: DataTypes.FLOAT, allowNull: false, defaultValue: 0 },
      goalsFor: { type: DataTypes.INTEGER, allowNull: false, defaultValue: 0 },
      shotsFor: { type: DataTypes.INTEGER, allowNull: false, defaultValue: 0 }
    },
    {
      sequelize,
      tableName: 'shared_ice_stats',
      modelName: 'SharedIceStat',
      timestamps: true,
      indexes: [
        { fields: ['season', 'teamId'] },
        { fields: ['gameId', 'playerA', 'playerB'], unique: true }
      ]
    }
  );
  return SharedIceStat;
}
