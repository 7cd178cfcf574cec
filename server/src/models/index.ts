// server/src/models/index.ts


import { sequelize } from '../db.js';
import { initTeam, Team } from './Team.js';
import { initPlayer, Player } from './Player.js';
import { initGame, Game } from './Game.js';
import { initPlayerGameStat, PlayerGameStat } from './PlayerGameStat.js';
import { initGoalieGameStat, GoalieGameStat } from './GoalieGameStat.js';
import { initShotEvent, ShotEvent } from './ShotEvent.js';
import { initScoringEvent, ScoringEvent } from './ScoringEvent.js';
import { initSharedIceStat, SharedIceStat } from './SharedIceStat.js';
import { initTeamLine, TeamLine } from './TeamLine.js';

initTeam(sequelize);
initPlayer(sequelize);
initGame(sequelize);
initPlayerGameStat(sequelize);
initGoalieGameStat(sequelize);
initShotEvent(sequelize);
initScoringEvent(sequelize);
initSharedIceStat(sequelize);
initTeamLine(sequelize);

// associations
Team.hasMany(Player, { as: 'players', foreignKey: 'teamId', sourceKey: 'teamId', constraints: false });
Player.belongsTo(Team, { as: 'team', foreignKey: 'teamId', targetKey: 'teamId', constraints: false });

Player.hasMany(PlayerGameStat, { as: 'gameStats', foreignKey: 'playerId', sourceKey: 'playerId' });
PlayerGameStat.belongsTo(Player, { foreignKey: 'playerId', targetKey: 'playerId' });

Player.hasMany(GoalieGameStat, { as: 'goalieStats', foreignKey: 'playerId', sourceKey: 'playerId' });
GoalieGameStat.belongsTo(Player, { foreignKey: 'playerId', targetKey: 'playerId' });

Game.hasMany(PlayerGameStat, { foreignKey: 'gameId', sourceKey: 'gameId', constraints: false });
PlayerGameStat.belongsTo(Game, { foreignKey: 'gameId', targetKey: 'gameId', constraints: false });

Game.hasMany(ShotEvent, { as: 'shots', foreignKey: 'gameId', sourceKey: 'gameId', constraints: false });
ShotEvent.belongsTo(Game, { foreignKey: 'gameId', targetKey: 'gameId', constraints: false });

Game.hasMany(ScoringEvent, { as: 'scoring', foreignKey: 'gameId', sourceKey: 'gameId', constraints: false });
ScoringEvent.belongsTo(Game, { foreignKey: 'gameId', targetKey: 'gameId', constraints: false });

Game.hasMany(SharedIceStat, { foreignKey: 'gameId', sourceKey: 'gameId', constraints: false });
Team.hasMany(SharedIceStat, { foreignKey: 'teamId', sourceKey: 'teamId', constraints: false });
SharedIceStat.belongsTo(Team, { foreignKey: 'teamId', targetKey: 'teamId', constraints: false });

Team.hasMany(TeamLine, { as: 'lines', foreignKey: 'teamId', sourceKey: 'teamId', constraints: false });
TeamLine.belongsTo(Team, { foreignKey: 'teamId', targetKey: 'teamId', constraints: false });

TeamLine.belongsTo(Player, { as: 'player', foreignKey: 'playerId', targetKey: 'playerId', constraints: false });

export { Team, Player, Game, PlayerGameStat, GoalieGameStat, ShotEvent, ScoringEvent, SharedIceStat, TeamLine };
export async function syncModels(options: { alter?: boolean } = {}) {
  await sequelize.sync(options);
}
