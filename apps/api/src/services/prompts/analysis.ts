/**
 * Instructions for the content-analysis pipelines (papers, repositories, model-hub entries).
 * The reflection prompt asks for the literal phrase "需要改进" so the repair trigger can detect it.
 */

export const VISION_PROMPT = `作为视觉分析Agent，你需要分析图片内容并提供专业解读。

对于架构图/流程图：
1. 识别图中的主要组件和模块
2. 解释组件之间的关系和数据流向
3. 总结整体架构设计思路

对于实验结果图/表格：
1. 识别图表类型（折线图、柱状图、表格等）
2. 提取关键数据点和趋势
3. 解读实验结论

对于其他图片：
1. 描述图片主要内容
2. 分析其在论文/项目中的作用
3. 提取关键信息

请用中文输出分析结果，结构清晰。`;

// ---------- Papers ----------

export const PAPER_PLAN_PROMPT = `作为大脑Agent，你需要规划论文分析任务。请分析这篇论文，确定需要重点关注的方面，为其他专家Agent提供指导。

请输出:
1. 论文的核心主题是什么
2. 需要方法理解Agent重点关注哪些技术点
3. 需要实验分析Agent重点关注哪些实验
4. 需要审稿人Agent重点审查哪些方面`;

export const METHOD_PROMPT = `作为方法理解Agent，你需要深入理解论文的核心方法。请分析:

## 1. 核心Motivation
- 这项工作要解决什么根本问题？
- 现有方法的核心缺陷是什么？
- 作者的关键洞察(insight)是什么？

## 2. 核心方法
- 方法的核心思想用一句话概括
- 方法最核心的技术创新点
- 方法的数学原理或算法流程

## 3. 方法框架
- 用文字描述方法的整体框架（可以用ASCII图或结构化描述）
- 各个模块的作用和相互关系

## 4. 与现有方法的本质区别
- 与最相关的baseline方法相比，本质区别是什么？

请深入到方法的本质，而非表面描述。`;

export const EXPERIMENT_PROMPT = `作为实验分析Agent，你需要全面分析论文的实验部分。请分析:

## 1. 实验任务
- 论文在哪些任务上进行了验证？
- 每个任务的定义和评价指标是什么？

## 2. 数据集
- 使用了哪些数据集？规模和特点是什么？

## 3. 实验设置
- 主要的baseline方法有哪些？
- 实验的超参数设置如何？

## 4. 实验结果
- 主实验的结果如何？提升了多少？
- 消融实验验证了哪些设计的有效性？

## 5. 资源消耗
- 训练需要多少计算资源？推理速度如何？模型参数量多大？`;

export const REVIEW_PROMPT = `作为审稿人Agent，你需要以严格的学术标准批判性地评审这篇论文。请从以下角度分析:

## 1. 论文优势
- 创新性、有效性、清晰度

## 2. 论文劣势
- 方法的局限性、实验设计的不足、未解决的问题

## 3. 学术规范性
- 代码是否开源？实验是否可复现？
- 与相关工作的比较是否公平？结果是否存在过度claim？

## 4. 改进建议
- 如果你是审稿人，会提出哪些修改意见？

## 5. 总体评价
- 给出Accept/Weak Accept/Weak Reject/Reject的建议及理由`;

export const PAPER_SUMMARY_PROMPT = `作为大脑Agent，请汇总各专家的分析结果，生成一份结构化的论文分析报告。

请按以下格式输出最终报告:

# 论文深度分析报告

## 一、核心贡献与创新
（基于方法理解Agent的分析，提炼最核心的1-3个贡献）

## 二、研究动机与洞察
（这项工作的出发点和关键insight）

## 三、方法详解
（核心方法的原理和框架）

## 四、实验验证
（关键实验结果和结论）

## 五、批判性评价
（优势、劣势、学术规范性）

## 六、研究启发
（对后续研究的启发和可能的改进方向）`;

// ---------- Repositories and model-hub entries ----------

export const PROJECT_PLAN_PROMPT = `作为大脑Agent，你需要规划项目分析任务。请分析这个项目，确定需要重点关注的方面。

请输出:
1. 项目的核心功能是什么
2. 需要架构分析Agent重点关注哪些模块
3. 需要代码分析Agent重点分析哪些文件
4. 需要使用分析Agent重点说明哪些使用方法`;

export const ARCHITECTURE_PROMPT = `作为架构分析Agent，你需要深入分析项目的架构设计。请分析:

## 1. 项目定位
- 这个项目解决什么问题？目标用户是谁？与同类项目相比有什么优势？

## 2. 技术架构
- 整体架构设计是怎样的？核心模块有哪些？模块之间如何交互？

## 3. 技术栈
- 使用了哪些编程语言/框架/库？技术选型是否合理？

## 4. 设计模式
- 使用了哪些设计模式？代码组织结构是否清晰？`;

export const CODE_PROMPT = `作为代码分析Agent，你需要深入分析项目的核心代码。请分析:

## 1. 核心算法/逻辑
- 项目的核心算法是什么？关键函数/类的实现思路是什么？

## 2. 代码质量
- 代码风格是否规范？注释和文档是否充分？错误处理是否完善？

## 3. 关键实现
- 最重要的几个文件/函数是什么？它们如何实现核心功能？

## 4. 可扩展性
- 代码是否易于扩展？有哪些可以改进的地方？`;

export const USAGE_PROMPT = `作为使用分析Agent，你需要分析项目的使用方法。请分析:

## 1. 安装配置
- 如何安装？需要哪些依赖？有哪些配置选项？

## 2. 基本使用
- 最基本的使用流程是什么？有哪些常用命令/API？

## 3. 高级功能
- 有哪些高级功能或配置？如何进行自定义扩展？

## 4. 注意事项
- 使用时需要注意什么？常见问题和解决方案是什么？`;

export const PROJECT_SUMMARY_PROMPT = `作为大脑Agent，请汇总各专家的分析结果，生成一份结构化的项目分析报告。

请按以下格式输出最终报告:

# 项目深度分析报告

## 一、项目概述
（项目定位、解决的问题、目标用户）

## 二、核心创新与价值
（项目的核心创新点和独特价值）

## 三、技术架构
（整体架构、核心模块、技术栈）

## 四、代码分析
（核心实现、代码质量、关键算法）

## 五、使用指南
（安装、基本使用、高级功能）

## 六、研究价值与应用场景
（对研究的启发、适用场景、改进方向）`;

// ---------- Quality control ----------

export const REFLECT_PROMPT = `作为大脑Agent，请检查最终报告的质量:

1. 是否准确反映了核心贡献？
2. 是否深入分析了本质，而非表面描述？
3. 是否有遗漏的重要信息？
4. 各部分是否逻辑连贯？

如果发现问题，请指出"需要改进"并说明具体问题。
如果质量合格，请回复"质量合格"。`;

export const IMPROVE_PROMPT = `作为大脑Agent，请根据质量检查的反馈改进报告。

请输出改进后的完整报告。`;
