import type { ViewProfile } from './profile.js';

/** Daily restaurant role-play task KPIs, one row per restaurant per day. */
export const ROLEPLAY_DAILY_REPORTS: ViewProfile = {
  name: 'roleplay_daily_reports',
  description: '餐厅角色扮演任务日报数据 - 57个KPI指标，涵盖总体、角色、时段维度的任务完成情况',
  dateColumn: '运营日期',
  dimensionIdColumn: '餐厅ID',
  dimensionNameColumn: '餐厅完整名称',
  columns: {
    报表唯一标识: { english: 'report_id', description: '每条记录的唯一标识' },
    运营日期: { english: 'operating_date', description: '报表对应的运营日期' },
    餐厅ID: { english: 'restaurant_id', description: '餐厅的唯一标识' },
    餐厅完整名称: { english: 'restaurant_name', description: '餐厅名称（品牌-城市-门店）' },
    总任务数量: { english: 'total_tasks', description: '当天所有任务的总数' },
    已完成任务数量: { english: 'completed_tasks', description: '当天已完成的任务数量' },
    总体任务完成率: { english: 'overall_completion_rate', description: '总体任务完成百分比 (0-100)' },
    总体任务准时率: { english: 'overall_ontime_rate', description: '总体任务准时完成百分比 (0-100)' },
    店长总任务数量: { english: 'manager_total_tasks', description: '店长角色的总任务数' },
    店长已完成任务数量: { english: 'manager_completed_tasks', description: '店长已完成的任务数' },
    店长任务完成率: { english: 'manager_completion_rate', description: '店长任务完成百分比' },
    店长任务准时率: { english: 'manager_ontime_rate', description: '店长任务准时完成百分比' },
    值班经理总任务数量: { english: 'duty_manager_total_tasks', description: '值班经理角色的总任务数' },
    值班经理已完成任务数量: { english: 'duty_manager_completed_tasks', description: '值班经理已完成的任务数' },
    值班经理任务完成率: { english: 'duty_manager_completion_rate', description: '值班经理任务完成百分比' },
    值班经理任务准时率: { english: 'duty_manager_ontime_rate', description: '值班经理任务准时完成百分比' },
    厨师总任务数量: { english: 'chef_total_tasks', description: '厨师角色的总任务数' },
    厨师已完成任务数量: { english: 'chef_completed_tasks', description: '厨师已完成的任务数' },
    厨师任务完成率: { english: 'chef_completion_rate', description: '厨师任务完成百分比' },
    厨师任务准时率: { english: 'chef_ontime_rate', description: '厨师任务准时完成百分比' },
    手动闭店任务是否完成: { english: 'manual_closing_completed', description: '手动闭店任务的完成状态 (true/false)' },
    闭店任务ID: { english: 'closing_task_id', description: '闭店任务的唯一标识' },
  },
  usageHints: [
    '查询时使用中文列名并加双引号: SELECT "餐厅完整名称", "总体任务完成率" FROM roleplay_daily_reports',
    '日期过滤: WHERE "运营日期"::date = \'2025-10-21\'',
    '模糊搜索餐厅: WHERE "餐厅完整名称" ILIKE \'%绵阳%\'',
    '排除零任务: WHERE "总任务数量" > 0',
    '按完成率排序: ORDER BY "总体任务完成率" DESC',
    '聚合查询: SELECT AVG("总体任务完成率") FROM roleplay_daily_reports WHERE ...',
    '分组统计: GROUP BY "餐厅完整名称"',
  ],
};

/** Same columns and hints under a different view name. */
export function roleplayProfileFor(viewName: string): ViewProfile {
  if (viewName === ROLEPLAY_DAILY_REPORTS.name) return ROLEPLAY_DAILY_REPORTS;
  return {
    ...ROLEPLAY_DAILY_REPORTS,
    name: viewName,
    usageHints: ROLEPLAY_DAILY_REPORTS.usageHints.map((hint) =>
      hint.split(ROLEPLAY_DAILY_REPORTS.name).join(viewName),
    ),
  };
}
