export const RELATED_KEYWORD_PROMPT = `分析以下论文，提取用于搜索相关工作的关键词。

请输出:
1. 核心技术关键词（3-5个，用于arXiv搜索）
2. 任务/应用领域关键词（2-3个）
3. 方法类别关键词（2-3个）

格式示例:
- 关键词1: "transformer attention mechanism"
- 关键词2: "large language model"
`;

export const RELATED_FILTER_PROMPT = `作为大脑Agent，请从候选论文中筛选出与当前论文最相关的5-10篇。

筛选标准:
1. 技术方法相似度
2. 研究任务相关性
3. 时间相近性（优先近期工作）

请输出筛选结果，格式:
[编号] 论文标题 - 相关原因（一句话）`;

export const RELATED_TECH_PROMPT = `作为技术框架分析Agent，请对比分析当前论文与相关论文在技术框架上的异同。

请分析:
1. 核心技术方法的异同
2. 模型架构的差异
3. 创新点的对比
4. 技术演进关系（哪些是前序工作，哪些是并行工作）`;

export const RELATED_EXPERIMENT_PROMPT = `作为实验分析Agent，请对比分析当前论文与相关论文在实验方面的异同。

请分析:
1. 实验任务的异同
2. 使用数据集的对比
3. 评价指标的差异
4. 实验效果的对比（如果有）`;

export const RELATED_SUMMARY_PROMPT = `作为大脑Agent，请汇总所有分析结果，生成一份完整的相关研究分析报告。

请按以下格式输出:

# 相关研究深度分析报告

## 一、搜索关键词
## 二、最相关论文列表
（筛选出的5-10篇最相关论文，包含标题、链接、相关原因）
## 三、技术框架对比
## 四、实验任务对比
## 五、研究脉络分析
（这些工作之间的演进关系，当前论文在该领域的定位）
## 六、推荐阅读顺序`;

export const NO_RELATED_PAPERS_MESSAGE = '未找到相关论文，请尝试其他搜索关键词。';
